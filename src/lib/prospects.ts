import type { SupabaseClient } from './supabase.js';
import { isRecord, readNumber, readString } from '../utils/parsing.js';
import { CONTACTED_STATUSES, SEQUENCE_FIELDS } from '../types.js';
import type { Lead, LeadSource, LeadStatus } from '../types.js';
import type { ContactRow } from '../filters/dedupe.js';
import type { ContactHistoryRow } from '../filters/cooldown.js';

// PostgREST caps a single select at 1000 rows
const PAGE_SIZE = 1000;

const LEAD_STATUSES: readonly LeadStatus[] = ['ready', ...CONTACTED_STATUSES];

/**
 * Persistence seam for prospects. Methods throw on store errors; callers
 * decide whether a failure is fatal.
 */
export interface ProspectStore {
  getExistingContacts(): Promise<ContactRow[]>;
  getContactHistory(): Promise<ContactHistoryRow[]>;
  insertProspects(leads: Lead[]): Promise<number>;
  getReadyProspects(limit: number): Promise<Lead[]>;
  markSent(ids: string[], sentAt: string): Promise<void>;
  updateStatus(id: string, status: LeadStatus): Promise<void>;
  countProspects(): Promise<number>;
  countByStatus(): Promise<Record<string, number>>;
  getProspectsByStatus(status: LeadStatus): Promise<Lead[]>;
}

interface PageResponse {
  data: unknown[] | null;
  error: { message: string } | null;
}

export function isLeadStatus(value: string | undefined): value is LeadStatus {
  return LEAD_STATUSES.some((status) => status === value);
}

function isLeadSource(value: string | undefined): value is LeadSource {
  return value === 'linkedin_jobs' || value === 'linkedin_profiles';
}

function nullableString(row: Record<string, unknown>, key: string): string | null {
  return readString(row, key) || null;
}

/**
 * Normalizes a table row into a Lead. NULL text columns become ''.
 */
export function rowToLead(value: unknown): Lead | null {
  if (!isRecord(value)) return null;
  const row = value;

  const text = (key: string): string => readString(row, key) ?? '';
  const id = row.id;
  const source = readString(row, 'source');
  const status = readString(row, 'status');
  const score = readNumber(row, 'verification_score');

  const lead: Lead = {
    company_name: text('company_name'),
    company_domain: nullableString(row, 'company_domain'),
    email: text('email'),
    first_name: text('first_name'),
    last_name: text('last_name'),
    title: text('title'),
    job_title: text('job_title'),
    job_url: text('job_url'),
    location: text('location'),
    source_keyword: text('source_keyword'),
    posted_date: text('posted_date'),
    source: isLeadSource(source) ? source : '',
    linkedin_url: text('linkedin_url'),
    subject_line: '',
    email_1: '',
    email_1_ps: '',
    email_2: '',
    email_3: '',
  };
  for (const field of SEQUENCE_FIELDS) {
    lead[field] = text(field);
  }

  if (typeof id === 'string' || typeof id === 'number') lead.id = String(id);
  if (readString(row, 'company_type') === 'b2b') lead.company_type = 'b2b';
  if (readString(row, 'verification_status')) lead.verification_status = text('verification_status');
  if (score !== undefined) lead.verification_score = score;
  if (isLeadStatus(status)) lead.status = status;
  if (readString(row, 'created_at')) lead.created_at = text('created_at');
  if ('sent_at' in row) lead.sent_at = nullableString(row, 'sent_at');

  return lead;
}

/**
 * Insert shape: the store assigns ids, first persistence stamps created_at and
 * the initial status.
 */
export function toInsertRow(lead: Lead, now: Date = new Date()): Omit<Lead, 'id'> {
  const { id: _id, ...row } = lead;
  return {
    ...row,
    created_at: lead.created_at ?? now.toISOString(),
    status: lead.status ?? 'ready',
  };
}

export class SupabaseProspectStore implements ProspectStore {
  constructor(
    private readonly client: SupabaseClient,
    private readonly table: string
  ) {}

  private async selectAll(
    label: string,
    page: (from: number, to: number) => PromiseLike<PageResponse>
  ): Promise<unknown[]> {
    const rows: unknown[] = [];
    for (let from = 0; ; from += PAGE_SIZE) {
      const { data, error } = await page(from, from + PAGE_SIZE - 1);
      if (error) {
        throw new Error(`Failed to ${label}: ${error.message}`);
      }
      const batch = data ?? [];
      rows.push(...batch);
      if (batch.length < PAGE_SIZE) return rows;
    }
  }

  private toLeads(rows: unknown[] | null): Lead[] {
    const leads: Lead[] = [];
    for (const row of rows ?? []) {
      const lead = rowToLead(row);
      if (lead) leads.push(lead);
    }
    return leads;
  }

  async getExistingContacts(): Promise<ContactRow[]> {
    const rows = await this.selectAll('fetch existing contacts', (from, to) =>
      this.client.from(this.table).select('company_domain, email').range(from, to)
    );
    return rows.filter(isRecord).map((row) => ({
      company_domain: nullableString(row, 'company_domain'),
      email: nullableString(row, 'email'),
    }));
  }

  async getContactHistory(): Promise<ContactHistoryRow[]> {
    const rows = await this.selectAll('fetch contact history', (from, to) =>
      this.client
        .from(this.table)
        .select('company_domain, created_at')
        .in('status', [...CONTACTED_STATUSES])
        .order('created_at', { ascending: false })
        .range(from, to)
    );
    return rows.filter(isRecord).map((row) => ({
      company_domain: nullableString(row, 'company_domain'),
      created_at: nullableString(row, 'created_at'),
    }));
  }

  async insertProspects(leads: Lead[]): Promise<number> {
    if (leads.length === 0) return 0;

    const now = new Date();
    const { data, error } = await this.client
      .from(this.table)
      .insert(leads.map((lead) => toInsertRow(lead, now)))
      .select('id');

    if (error) {
      throw new Error(`Failed to insert prospects: ${error.message}`);
    }
    return data?.length ?? 0;
  }

  async getReadyProspects(limit: number): Promise<Lead[]> {
    const { data, error } = await this.client
      .from(this.table)
      .select('*')
      .eq('status', 'ready')
      .eq('company_type', 'b2b')
      .not('email', 'is', null)
      .not('email_1', 'is', null)
      .order('created_at', { ascending: true })
      .limit(limit);

    if (error) {
      throw new Error(`Failed to fetch ready prospects: ${error.message}`);
    }
    return this.toLeads(data);
  }

  async markSent(ids: string[], sentAt: string): Promise<void> {
    if (ids.length === 0) return;

    const { error } = await this.client
      .from(this.table)
      .update({ status: 'sent', sent_at: sentAt })
      .in('id', ids);

    if (error) {
      throw new Error(`Failed to mark prospects as sent: ${error.message}`);
    }
  }

  async updateStatus(id: string, status: LeadStatus): Promise<void> {
    const { error } = await this.client.from(this.table).update({ status }).eq('id', id);

    if (error) {
      throw new Error(`Failed to update prospect ${id}: ${error.message}`);
    }
  }

  async countProspects(): Promise<number> {
    const { count, error } = await this.client.from(this.table).select('id', { count: 'exact', head: true });

    if (error) {
      throw new Error(`Failed to count prospects: ${error.message}`);
    }
    return count ?? 0;
  }

  async countByStatus(): Promise<Record<string, number>> {
    const rows = await this.selectAll('count prospects by status', (from, to) =>
      this.client.from(this.table).select('status').range(from, to)
    );

    const counts: Record<string, number> = {};
    for (const row of rows) {
      const status = (isRecord(row) && readString(row, 'status')) || 'unknown';
      counts[status] = (counts[status] ?? 0) + 1;
    }
    return counts;
  }

  async getProspectsByStatus(status: LeadStatus): Promise<Lead[]> {
    const rows = await this.selectAll(`fetch ${status} prospects`, (from, to) =>
      this.client.from(this.table).select('*').eq('status', status).range(from, to)
    );
    return this.toLeads(rows);
  }
}
