import { SEQUENCE_FIELDS } from '../types.js';
import type { CampaignRecord, Lead, RawJobPosting, RawLeadRecord, RawProfile } from '../types.js';

function emptyLead(): Lead {
  return {
    company_name: '',
    company_domain: null,
    email: '',
    first_name: '',
    last_name: '',
    title: '',
    job_title: '',
    job_url: '',
    location: '',
    source_keyword: '',
    posted_date: '',
    source: '',
    linkedin_url: '',
    subject_line: '',
    email_1: '',
    email_1_ps: '',
    email_2: '',
    email_3: '',
  };
}

function fromJobPosting(posting: RawJobPosting): Lead {
  return {
    ...emptyLead(),
    company_name: posting.company_name || '',
    job_title: posting.job_title || '',
    job_url: posting.job_url || '',
    location: posting.location || '',
    source_keyword: posting.source_keyword || '',
    posted_date: posting.posted_date || '',
    source: 'linkedin_jobs',
  };
}

function fromProfile(profile: RawProfile, searchLabel: string): Lead {
  return {
    ...emptyLead(),
    company_name: profile.companyName || profile.currentCompany?.name || '',
    job_title: profile.headline || profile.jobTitle || '',
    job_url: profile.profileUrl || profile.publicIdentifier || '',
    linkedin_url: profile.profileUrl || '',
    first_name: profile.firstName || '',
    last_name: profile.lastName || '',
    location: profile.geoLocationName || profile.geoCountryName || '',
    source_keyword: searchLabel,
    source: 'linkedin_profiles',
  };
}

/**
 * Maps a scraped job posting or profile onto the canonical Lead shape.
 * Missing text fields become '', company_domain stays null until resolved.
 */
export function toCanonicalLead(record: RawLeadRecord): Lead {
  switch (record.kind) {
    case 'job_posting':
      return fromJobPosting(record.posting);
    case 'profile':
      return fromProfile(record.profile, record.searchLabel || '');
  }
}

/**
 * Campaign upload shape. Sequence fields with no content are left out of
 * custom_fields entirely; the campaign templates treat an absent field
 * differently from an empty one.
 */
export function toCampaignPayload(lead: Lead): CampaignRecord {
  const customFields: CampaignRecord['custom_fields'] = {};
  for (const field of SEQUENCE_FIELDS) {
    const value = lead[field];
    if (value) {
      customFields[field] = value;
    }
  }

  return {
    email: lead.email || '',
    first_name: lead.first_name || '',
    last_name: lead.last_name || '',
    company_name: lead.company_name || '',
    custom_fields: customFields,
  };
}
