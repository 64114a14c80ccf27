import { errorMessage, HttpError } from './errors.js';
import { isRecord, readNumber } from '../utils/parsing.js';
import type { JsonRecord } from '../utils/parsing.js';
import type { CampaignRecord } from '../types.js';

const SMARTLEAD_API_BASE = 'https://server.smartlead.ai/api/v1';

// Max leads Smartlead accepts per request
export const CAMPAIGN_BATCH_SIZE = 100;

export interface AddLeadsOptions {
  ignoreDuplicatesInOtherCampaigns?: boolean;
}

export interface CampaignBatchResult {
  start: number; // offset of the batch's first record in the input
  size: number;
  ok: boolean;
  added: number;
  duplicates: number;
  invalid: number;
  error?: string;
}

export interface CampaignUploadStats {
  total: number;
  added: number;
  duplicates: number;
  invalid: number;
}

export interface CampaignAddResult {
  batches: CampaignBatchResult[];
  stats: CampaignUploadStats;
}

export interface CampaignClient {
  addLeads(records: CampaignRecord[], options?: AddLeadsOptions): Promise<CampaignAddResult>;
  getCampaignStats(): Promise<JsonRecord>;
}

export interface SmartleadClientOptions {
  apiKey: string;
  campaignId: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

export class SmartleadClient implements CampaignClient {
  private readonly apiKey: string;
  private readonly campaignId: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(opts: SmartleadClientOptions) {
    this.apiKey = opts.apiKey;
    this.campaignId = opts.campaignId;
    this.timeoutMs = opts.timeoutMs;
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  private campaignUrl(path = ''): string {
    const query = new URLSearchParams({ api_key: this.apiKey });
    return `${SMARTLEAD_API_BASE}/campaigns/${encodeURIComponent(this.campaignId)}${path}?${query.toString()}`;
  }

  private async postBatch(batch: CampaignRecord[], options: AddLeadsOptions): Promise<JsonRecord> {
    const response = await this.fetchImpl(this.campaignUrl('/leads'), {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        lead_list: batch,
        settings: {
          ignore_global_block_list: false,
          ignore_unsubscribe_list: false,
          ignore_duplicate_leads_in_other_campaign: options.ignoreDuplicatesInOtherCampaigns ?? true,
        },
      }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      throw new HttpError('Smartlead', response.status, await response.text());
    }

    const body: unknown = await response.json();
    return isRecord(body) ? body : {};
  }

  /**
   * Uploads records in batches of 100. A failed batch is reported and the
   * remaining batches still run.
   */
  async addLeads(records: CampaignRecord[], options: AddLeadsOptions = {}): Promise<CampaignAddResult> {
    const batches: CampaignBatchResult[] = [];
    const stats: CampaignUploadStats = { total: 0, added: 0, duplicates: 0, invalid: 0 };

    for (let start = 0; start < records.length; start += CAMPAIGN_BATCH_SIZE) {
      const batch = records.slice(start, start + CAMPAIGN_BATCH_SIZE);
      const batchNumber = start / CAMPAIGN_BATCH_SIZE + 1;

      try {
        const result = await this.postBatch(batch, options);
        const added = readNumber(result, 'total_leads') ?? 0;
        const duplicates = readNumber(result, 'already_added_to_campaign') ?? 0;
        const invalid = readNumber(result, 'invalid_email_count') ?? 0;

        stats.total += batch.length;
        stats.added += added;
        stats.duplicates += duplicates;
        stats.invalid += invalid;
        batches.push({ start, size: batch.length, ok: true, added, duplicates, invalid });
        console.log(`   ✅ Batch ${batchNumber}: ${added} added`);
      } catch (error) {
        const message = errorMessage(error);
        batches.push({ start, size: batch.length, ok: false, added: 0, duplicates: 0, invalid: 0, error: message });
        console.error(`   ❌ Batch ${batchNumber} failed: ${message}`);
      }
    }

    return { batches, stats };
  }

  async getCampaignStats(): Promise<JsonRecord> {
    const response = await this.fetchImpl(this.campaignUrl(), {
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      throw new HttpError('Smartlead', response.status, await response.text());
    }

    const body: unknown = await response.json();
    return isRecord(body) ? body : {};
  }
}
