import type { ApiServices } from './services.js';

// Hono app environment type for typed context variables
export type AppEnv = {
  Variables: {
    apiKey: string;
    services: ApiServices;
  };
};

export type LeadStatus = 'ready' | 'sent' | 'replied' | 'interested' | 'bounced' | 'not_interested';

// Statuses that count as "this domain has been contacted" for the cooldown window
export const CONTACTED_STATUSES: readonly LeadStatus[] = ['sent', 'replied', 'interested', 'bounced', 'not_interested'];

export type LeadSource = 'linkedin_jobs' | 'linkedin_profiles';

export const SEQUENCE_FIELDS = ['subject_line', 'email_1', 'email_1_ps', 'email_2', 'email_3'] as const;
export type SequenceField = (typeof SEQUENCE_FIELDS)[number];
export type EmailSequence = Record<SequenceField, string>;

/**
 * Canonical prospect record. Field names match the `prospects` table columns,
 * so a Lead can be inserted as-is.
 */
export interface Lead extends EmailSequence {
  id?: string;

  // Identity
  company_name: string;
  company_domain: string | null; // null until resolved

  // Contact
  email: string;
  first_name: string;
  last_name: string;
  title: string;

  // Provenance
  job_title: string;
  job_url: string;
  location: string;
  source_keyword: string;
  posted_date: string;
  source: LeadSource | '';
  linkedin_url: string;

  // Classification + verification
  company_type?: 'b2b';
  verification_status?: string;
  verification_score?: number;

  // Lifecycle
  status?: LeadStatus;
  created_at?: string;
  sent_at?: string | null;
}

// ============================================================================
// RAW SCRAPER RECORDS
// ============================================================================

export interface RawJobPosting {
  job_title?: string;
  company_name?: string;
  location?: string;
  job_url?: string;
  posted_date?: string;
  posted_age_days?: number;
  source_keyword?: string;
}

export interface RawProfile {
  firstName?: string;
  lastName?: string;
  headline?: string;
  jobTitle?: string;
  profileUrl?: string;
  publicIdentifier?: string;
  companyName?: string;
  currentCompany?: { name?: string };
  geoLocationName?: string;
  geoCountryName?: string;
}

export type RawLeadRecord =
  | { kind: 'job_posting'; posting: RawJobPosting }
  | { kind: 'profile'; profile: RawProfile; searchLabel?: string };

// ============================================================================
// CAMPAIGN PAYLOAD
// ============================================================================

export interface CampaignRecord {
  email: string;
  first_name: string;
  last_name: string;
  company_name: string;
  custom_fields: Partial<Record<SequenceField, string>>;
}
