import { describe, it, expect, vi } from 'vitest';
import type { Mock } from 'vitest';
import { ApifyScraper, buildJobSearchUrl } from './apify.js';
import { HttpError } from './errors.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function requestBody(fetchImpl: Mock<typeof fetch>): unknown {
  const init = fetchImpl.mock.calls[0][1];
  return JSON.parse(typeof init?.body === 'string' ? init.body : '{}');
}

describe('buildJobSearchUrl', () => {
  it('encodes keyword and location with the past-week filter', () => {
    expect(buildJobSearchUrl('VP Sales', { location: 'France', geoId: '105015875' })).toBe(
      'https://www.linkedin.com/jobs/search/?keywords=VP+Sales&location=France&geoId=105015875&f_TPR=r604800&start=0'
    );
  });
});

describe('ApifyScraper.scrapeJobs', () => {
  it('flattens per-page arrays and tags every posting with its keyword', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(
      jsonResponse([
        [
          { job_title: 'Head of Sales', company_name: 'Acme', location: 'Paris', job_url: 'https://jobs/1', posted_age_days: 2 },
          { job_title: 'CRO', company_name: 'Globex' },
        ],
        { job_title: 'CMO', company_name: 'Initech' },
        'garbage',
      ])
    );
    const scraper = new ApifyScraper({ apiKey: 'test-secret', timeoutMs: 1000, fetchImpl });

    const postings = await scraper.scrapeJobs('Head of Sales', { location: 'France', geoId: '105015875' });

    expect(postings.map((posting) => posting.company_name)).toEqual(['Acme', 'Globex', 'Initech']);
    expect(postings.every((posting) => posting.source_keyword === 'Head of Sales')).toBe(true);
    expect(postings[0]).toEqual({
      job_title: 'Head of Sales',
      company_name: 'Acme',
      location: 'Paris',
      job_url: 'https://jobs/1',
      posted_age_days: 2,
      source_keyword: 'Head of Sales',
    });

    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe('https://api.apify.com/v2/acts/apify~web-scraper/run-sync-get-dataset-items');
    expect(init?.headers).toEqual({ 'Content-Type': 'application/json', 'Authorization': 'Bearer test-secret' });
    expect(requestBody(fetchImpl)).toMatchObject({
      startUrls: [{ url: buildJobSearchUrl('Head of Sales', { location: 'France', geoId: '105015875' }) }],
      maxPagesPerCrawl: 8,
    });
  });

  it('throws HttpError on a non-2xx response', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(new Response('quota exceeded', { status: 402 }));
    const scraper = new ApifyScraper({ apiKey: 'test-secret', timeoutMs: 1000, fetchImpl });

    await expect(scraper.scrapeJobs('CRO', { location: 'France', geoId: '1' })).rejects.toBeInstanceOf(HttpError);
  });
});

describe('ApifyScraper.scrapeProfiles', () => {
  it('skips items carrying an error and keeps nested company names', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(
      jsonResponse([
        { firstName: 'Jane', lastName: 'Doe', currentCompany: { name: 'Acme' }, profileUrl: 'https://li/jane' },
        { error: 'Profile is private' },
        { firstName: 'Max', companyName: 'Globex' },
      ])
    );
    const scraper = new ApifyScraper({ apiKey: 'test-secret', timeoutMs: 1000, fetchImpl });

    const profiles = await scraper.scrapeProfiles('https://www.linkedin.com/search/results/people/?keywords=cro', 25);

    expect(profiles).toHaveLength(2);
    expect(profiles[0].currentCompany).toEqual({ name: 'Acme' });
    expect(profiles[1].companyName).toBe('Globex');
    expect(fetchImpl.mock.calls[0][0]).toBe(
      'https://api.apify.com/v2/acts/supreme_coder~linkedin-profile-scraper/run-sync-get-dataset-items'
    );
    expect(requestBody(fetchImpl)).toEqual({
      urls: ['https://www.linkedin.com/search/results/people/?keywords=cro'],
      maxProfiles: 25,
    });
  });

  it('returns nothing when the dataset is not a list', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ message: 'unexpected' }));
    const scraper = new ApifyScraper({ apiKey: 'test-secret', timeoutMs: 1000, fetchImpl });

    expect(await scraper.scrapeProfiles('https://li/search', 10)).toEqual([]);
  });
});
