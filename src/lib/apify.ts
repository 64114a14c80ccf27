import { HttpError } from './errors.js';
import { isRecord, readNumber, readRecord, readString } from '../utils/parsing.js';
import type { RawJobPosting, RawProfile } from '../types.js';

const APIFY_API_BASE = 'https://api.apify.com/v2';

// Actor ids use "~" in place of "/" inside API paths
const JOBS_ACTOR = 'apify~web-scraper';
const PROFILES_ACTOR = 'supreme_coder~linkedin-profile-scraper';

export interface JobSearchOptions {
  location: string;
  geoId: string;
}

export interface LeadScraper {
  scrapeJobs(keyword: string, opts: JobSearchOptions): Promise<RawJobPosting[]>;
  scrapeProfiles(searchUrl: string, maxProfiles: number): Promise<RawProfile[]>;
}

export interface ApifyScraperOptions {
  apiKey: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

// Runs in the crawled page; keeps postings from the last 7 days
const JOBS_PAGE_FUNCTION = `async function pageFunction(context) {
  const $ = context.jQuery;
  const jobs = [];
  $('.jobs-search__results-list li').each((index, element) => {
    const $job = $(element);
    const title = $job.find('.base-search-card__title').text().trim();
    const company = $job.find('.base-search-card__subtitle').text().trim();
    const location = $job.find('.job-search-card__location').text().trim();
    const jobUrl = $job.find('.base-card__full-link').attr('href');
    const postedText = $job.find('.job-search-card__listdate, .base-search-card__metadata time').text().trim();

    let ageInDays = 0;
    const amount = postedText.match(/(\\d+)/);
    if (/day|jour/.test(postedText)) {
      ageInDays = amount ? parseInt(amount[1], 10) : 1;
    } else if (/week|semaine/.test(postedText)) {
      ageInDays = amount ? parseInt(amount[1], 10) * 7 : 7;
    } else if (/month|mois/.test(postedText)) {
      ageInDays = 30;
    }

    if (title && company && ageInDays <= 7) {
      jobs.push({
        job_title: title,
        company_name: company,
        location: location,
        job_url: jobUrl,
        posted_date: new Date().toISOString().split('T')[0],
        posted_age_days: ageInDays
      });
    }
  });
  return jobs;
}`;

export function buildJobSearchUrl(keyword: string, opts: JobSearchOptions): string {
  const params = new URLSearchParams({
    keywords: keyword,
    location: opts.location,
    geoId: opts.geoId,
    f_TPR: 'r604800', // past week
    start: '0',
  });
  return `https://www.linkedin.com/jobs/search/?${params.toString()}`;
}

function toJobPosting(item: unknown): RawJobPosting | null {
  if (!isRecord(item)) return null;
  return {
    job_title: readString(item, 'job_title'),
    company_name: readString(item, 'company_name'),
    location: readString(item, 'location'),
    job_url: readString(item, 'job_url'),
    posted_date: readString(item, 'posted_date'),
    posted_age_days: readNumber(item, 'posted_age_days'),
  };
}

function toProfile(item: unknown): RawProfile | null {
  if (!isRecord(item) || item.error) return null;
  const currentCompany = readRecord(item, 'currentCompany');
  return {
    firstName: readString(item, 'firstName'),
    lastName: readString(item, 'lastName'),
    headline: readString(item, 'headline'),
    jobTitle: readString(item, 'jobTitle'),
    profileUrl: readString(item, 'profileUrl'),
    publicIdentifier: readString(item, 'publicIdentifier'),
    companyName: readString(item, 'companyName'),
    currentCompany: currentCompany ? { name: readString(currentCompany, 'name') } : undefined,
    geoLocationName: readString(item, 'geoLocationName'),
    geoCountryName: readString(item, 'geoCountryName'),
  };
}

export class ApifyScraper implements LeadScraper {
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(opts: ApifyScraperOptions) {
    this.apiKey = opts.apiKey;
    this.timeoutMs = opts.timeoutMs;
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  /**
   * Runs an actor synchronously and returns its dataset items.
   */
  private async runActor(actorId: string, input: Record<string, unknown>): Promise<unknown[]> {
    const response = await this.fetchImpl(`${APIFY_API_BASE}/acts/${actorId}/run-sync-get-dataset-items`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify(input),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      throw new HttpError('Apify', response.status, await response.text());
    }

    const data: unknown = await response.json();
    return Array.isArray(data) ? data : [];
  }

  async scrapeJobs(keyword: string, opts: JobSearchOptions): Promise<RawJobPosting[]> {
    const items = await this.runActor(JOBS_ACTOR, {
      startUrls: [{ url: buildJobSearchUrl(keyword, opts) }],
      pageFunction: JOBS_PAGE_FUNCTION,
      maxPagesPerCrawl: 8,
      maxConcurrency: 1,
      maxRequestRetries: 2,
    });

    // The page function returns one array per crawled page
    const postings: RawJobPosting[] = [];
    for (const item of items.flatMap((entry) => (Array.isArray(entry) ? entry : [entry]))) {
      const posting = toJobPosting(item);
      if (posting) {
        postings.push({ ...posting, source_keyword: keyword });
      }
    }
    return postings;
  }

  async scrapeProfiles(searchUrl: string, maxProfiles: number): Promise<RawProfile[]> {
    const items = await this.runActor(PROFILES_ACTOR, {
      urls: [searchUrl],
      maxProfiles,
    });

    const profiles: RawProfile[] = [];
    for (const item of items) {
      const profile = toProfile(item);
      if (profile) profiles.push(profile);
    }
    return profiles;
  }
}
