import { describe, it, expect, vi, beforeEach } from 'vitest';
import { SmartleadClient } from './smartlead.js';
import { HttpError } from './errors.js';
import type { CampaignRecord } from '../types.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function records(count: number): CampaignRecord[] {
  return Array.from({ length: count }, (_, i) => ({
    email: `lead${i}@example.com`,
    first_name: '',
    last_name: '',
    company_name: `Company ${i}`,
    custom_fields: { email_1: 'Hello' },
  }));
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

describe('SmartleadClient.addLeads', () => {
  it('posts batches of 100 and sums the response counters', async () => {
    const fetchImpl = vi
      .fn<typeof fetch>()
      .mockResolvedValueOnce(jsonResponse({ total_leads: 98, already_added_to_campaign: 2, invalid_email_count: 0 }))
      .mockResolvedValueOnce(jsonResponse({ total_leads: 20, already_added_to_campaign: 0, invalid_email_count: 1 }));
    const client = new SmartleadClient({ apiKey: 'test-secret', campaignId: '42', timeoutMs: 1000, fetchImpl });

    const result = await client.addLeads(records(121));

    expect(fetchImpl).toHaveBeenCalledTimes(2);
    expect(result.stats).toEqual({ total: 121, added: 118, duplicates: 2, invalid: 1 });
    expect(result.batches.map((batch) => [batch.start, batch.size, batch.ok])).toEqual([
      [0, 100, true],
      [100, 21, true],
    ]);

    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe('https://server.smartlead.ai/api/v1/campaigns/42/leads?api_key=test-secret');
    const body: unknown = JSON.parse(typeof init?.body === 'string' ? init.body : '{}');
    expect(body).toMatchObject({
      settings: {
        ignore_global_block_list: false,
        ignore_unsubscribe_list: false,
        ignore_duplicate_leads_in_other_campaign: true,
      },
    });
  });

  it('keeps going after a failed batch', async () => {
    const fetchImpl = vi
      .fn<typeof fetch>()
      .mockResolvedValueOnce(jsonResponse({ total_leads: 100 }))
      .mockResolvedValueOnce(new Response('bad gateway', { status: 502 }))
      .mockResolvedValueOnce(jsonResponse({ total_leads: 50 }));
    const client = new SmartleadClient({ apiKey: 'test-secret', campaignId: '42', timeoutMs: 1000, fetchImpl });

    const result = await client.addLeads(records(250));

    expect(fetchImpl).toHaveBeenCalledTimes(3);
    expect(result.batches.map((batch) => batch.ok)).toEqual([true, false, true]);
    expect(result.batches[1].error).toBe('Smartlead responded 502: bad gateway');
    expect(result.stats).toEqual({ total: 150, added: 150, duplicates: 0, invalid: 0 });
  });

  it('passes the duplicate setting through', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ total_leads: 1 }));
    const client = new SmartleadClient({ apiKey: 'test-secret', campaignId: '42', timeoutMs: 1000, fetchImpl });

    await client.addLeads(records(1), { ignoreDuplicatesInOtherCampaigns: false });

    const init = fetchImpl.mock.calls[0][1];
    const body: unknown = JSON.parse(typeof init?.body === 'string' ? init.body : '{}');
    expect(body).toMatchObject({ settings: { ignore_duplicate_leads_in_other_campaign: false } });
  });

  it('makes no request for an empty list', async () => {
    const fetchImpl = vi.fn<typeof fetch>();
    const client = new SmartleadClient({ apiKey: 'test-secret', campaignId: '42', timeoutMs: 1000, fetchImpl });

    expect(await client.addLeads([])).toEqual({ batches: [], stats: { total: 0, added: 0, duplicates: 0, invalid: 0 } });
    expect(fetchImpl).not.toHaveBeenCalled();
  });
});

describe('SmartleadClient.getCampaignStats', () => {
  it('returns the campaign body', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ id: 42, status: 'ACTIVE' }));
    const client = new SmartleadClient({ apiKey: 'test-secret', campaignId: '42', timeoutMs: 1000, fetchImpl });

    expect(await client.getCampaignStats()).toEqual({ id: 42, status: 'ACTIVE' });
    expect(fetchImpl.mock.calls[0][0]).toBe('https://server.smartlead.ai/api/v1/campaigns/42?api_key=test-secret');
  });

  it('throws HttpError on failure', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(new Response('unauthorized', { status: 401 }));
    const client = new SmartleadClient({ apiKey: 'test-secret', campaignId: '42', timeoutMs: 1000, fetchImpl });

    await expect(client.getCampaignStats()).rejects.toBeInstanceOf(HttpError);
  });
});
