import type { Lead } from '../types.js';

export interface ContactRow {
  company_domain: string | null;
  email: string | null;
}

/**
 * Encodes a (domain, email) identity pair as a Set key. JSON encoding keeps
 * the two halves apart whatever characters they contain.
 */
export function identityKey(domain: string, email: string): string {
  return JSON.stringify([domain, email]);
}

export function buildIdentitySet(rows: ContactRow[]): Set<string> {
  const keys = new Set<string>();
  for (const row of rows) {
    if (row.company_domain && row.email) {
      keys.add(identityKey(row.company_domain, row.email));
    }
  }
  return keys;
}

/**
 * Drops leads whose (company_domain, email) pair is already known. A lead
 * missing either half is never a duplicate. Exact match, order preserved.
 */
export function filterDuplicates<T extends Pick<Lead, 'company_domain' | 'email'>>(
  leads: readonly T[],
  existingIdentityKeys: ReadonlySet<string>
): T[] {
  return leads.filter((lead) => {
    if (!lead.company_domain || !lead.email) return true;
    return !existingIdentityKeys.has(identityKey(lead.company_domain, lead.email));
  });
}

/**
 * Keeps the first record per exact company name; records without a name are dropped.
 */
export function dedupeByCompanyName<T>(records: readonly T[], nameOf: (record: T) => string | undefined): T[] {
  const seenCompanies = new Set<string>();
  const unique: T[] = [];

  for (const record of records) {
    const companyName = nameOf(record);
    if (companyName && !seenCompanies.has(companyName)) {
      seenCompanies.add(companyName);
      unique.push(record);
    }
  }

  return unique;
}
