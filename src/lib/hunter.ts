import { errorMessage, HttpError } from './errors.js';
import { isRecord, readNumber, readRecord, readString } from '../utils/parsing.js';
import type { JsonRecord } from '../utils/parsing.js';

const HUNTER_API_BASE = 'https://api.hunter.io/v2';

export interface CompanyProfile {
  employee_range: string | null;
  industry: string | null;
  description: string | null;
}

export interface DecisionMaker {
  first_name: string;
  last_name: string;
  email: string;
  title: string;
  confidence: number;
}

export interface EmailVerification {
  status: string;
  score: number;
  verified: boolean;
}

/**
 * Resolves companies to domains, firmographics and a contact. Every method is
 * fail-soft: lookups that fail or find nothing return null or an empty value.
 */
export interface ContactResolver {
  findCompanyDomain(companyName: string): Promise<string | null>;
  getCompanyProfile(domain: string): Promise<CompanyProfile>;
  findDecisionMaker(domain: string): Promise<DecisionMaker | null>;
  verifyEmail(email: string): Promise<EmailVerification>;
}

export interface HunterClientOptions {
  apiKey: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

const EMPTY_PROFILE: CompanyProfile = { employee_range: null, industry: null, description: null };
const UNKNOWN_VERIFICATION: EmailVerification = { status: 'unknown', score: 0, verified: false };

// accept_all = catch-all domain; the mailbox cannot be confirmed, so the score decides
export function isDeliverable(status: string, score: number): boolean {
  return status === 'valid' || (status === 'accept_all' && score >= 80);
}

export class HunterClient implements ContactResolver {
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(opts: HunterClientOptions) {
    this.apiKey = opts.apiKey;
    this.timeoutMs = opts.timeoutMs;
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  /**
   * GETs an endpoint and returns its `data` object (or null when absent).
   */
  private async get(endpoint: string, params: Record<string, string>): Promise<JsonRecord | null> {
    const query = new URLSearchParams({ ...params, api_key: this.apiKey });
    const response = await this.fetchImpl(`${HUNTER_API_BASE}/${endpoint}?${query.toString()}`, {
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      throw new HttpError('Hunter', response.status, await response.text());
    }

    const body: unknown = await response.json();
    return isRecord(body) ? readRecord(body, 'data') ?? null : null;
  }

  async findCompanyDomain(companyName: string): Promise<string | null> {
    if (!companyName) return null;

    try {
      const data = await this.get('domain-search', { company: companyName });
      return (data && readString(data, 'domain')) || null;
    } catch (error) {
      console.warn(`   ⚠️  Domain lookup failed for ${companyName}: ${errorMessage(error)}`);
      return null;
    }
  }

  async getCompanyProfile(domain: string): Promise<CompanyProfile> {
    if (!domain) return EMPTY_PROFILE;

    try {
      const data = await this.get('companies/find', { domain });
      if (!data) return EMPTY_PROFILE;

      const metrics = readRecord(data, 'metrics');
      return {
        employee_range: (metrics && readString(metrics, 'employees')) || null,
        industry: readString(data, 'industry') || readString(data, 'sector') || null,
        description: readString(data, 'description') || null,
      };
    } catch (error) {
      // Unknown size is treated as a small company downstream
      console.warn(`   ⚠️  Company lookup failed for ${domain}: ${errorMessage(error)}`);
      return EMPTY_PROFILE;
    }
  }

  async findDecisionMaker(domain: string): Promise<DecisionMaker | null> {
    if (!domain) return null;

    try {
      const data = await this.get('domain-search', {
        domain,
        limit: '1',
        seniority: 'senior',
        type: 'personal',
      });
      const emails = data?.emails;
      if (!Array.isArray(emails) || emails.length === 0) return null;

      const contact: unknown = emails[0];
      if (!isRecord(contact)) return null;
      const email = readString(contact, 'value');
      if (!email) return null;

      return {
        first_name: readString(contact, 'first_name') || '',
        last_name: readString(contact, 'last_name') || '',
        email,
        title: readString(contact, 'position') || 'Decision Maker',
        confidence: readNumber(contact, 'confidence') ?? 0,
      };
    } catch (error) {
      console.warn(`   ⚠️  Contact search failed for ${domain}: ${errorMessage(error)}`);
      return null;
    }
  }

  async verifyEmail(email: string): Promise<EmailVerification> {
    if (!email) return { status: 'invalid', score: 0, verified: false };

    try {
      const data = await this.get('email-verifier', { email });
      if (!data) return UNKNOWN_VERIFICATION;

      const status = readString(data, 'status') || 'unknown';
      const score = readNumber(data, 'score') ?? 0;
      return { status, score, verified: isDeliverable(status, score) };
    } catch (error) {
      console.warn(`   ⚠️  Verification failed for ${email}: ${errorMessage(error)}`);
      return UNKNOWN_VERIFICATION;
    }
  }
}
