import type { Lead } from '../types.js';

export const DAY_MS = 24 * 60 * 60 * 1000;
export const DEFAULT_COOLDOWN_DAYS = 90;

const TIMESTAMP_PATTERN =
  /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2})(?::(\d{2}))?(?:\.(\d+))?)?\s*(Z|z|[+-]\d{2}(?::?\d{2})?)?$/;

function normalizeOffset(offset: string | undefined): string {
  if (!offset || offset === 'Z' || offset === 'z') return '+00:00';
  const sign = offset[0];
  const digits = offset.slice(1).replace(':', '');
  const hours = digits.slice(0, 2);
  const minutes = digits.slice(2, 4) || '00';
  return `${sign}${hours}:${minutes}`;
}

/**
 * Parses an external timestamp into an explicit-UTC instant. "Z", "+00",
 * "+0000" and "+00:00" are equivalent; a timestamp without an offset is read
 * as UTC, never as local time. Returns null when the text is not a timestamp.
 */
export function parseContactTimestamp(raw: string): Date | null {
  const match = raw.trim().match(TIMESTAMP_PATTERN);
  if (!match) return null;

  const [, date, hoursMinutes = '00:00', seconds = '00', fraction = '', offset] = match;
  const millis = fraction.slice(0, 3).padEnd(3, '0');
  const parsed = new Date(`${date}T${hoursMinutes}:${seconds}.${millis}${normalizeOffset(offset)}`);

  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

export interface ContactHistoryRow {
  company_domain: string | null;
  created_at: string | null;
}

/**
 * Latest contact timestamp per domain. Rows may arrive in any order; only
 * the most recent instant per domain is kept.
 */
export function buildLastContactMap(rows: ContactHistoryRow[]): Map<string, string> {
  const latest = new Map<string, { raw: string; at: number }>();

  for (const row of rows) {
    if (!row.company_domain || !row.created_at) continue;
    const parsed = parseContactTimestamp(row.created_at);
    if (!parsed) continue;

    const current = latest.get(row.company_domain);
    if (!current || parsed.getTime() > current.at) {
      latest.set(row.company_domain, { raw: row.created_at, at: parsed.getTime() });
    }
  }

  return new Map(Array.from(latest, ([domain, entry]) => [domain, entry.raw]));
}

/**
 * Drops leads whose domain was contacted within the cooldown window.
 * A lead is eligible only when strictly more than `cooldownDays` have elapsed;
 * a contact exactly `cooldownDays` ago is still in cooldown.
 */
export function filterCooldown<T extends Pick<Lead, 'company_domain'>>(
  leads: readonly T[],
  lastContactByDomain: ReadonlyMap<string, string>,
  cooldownDays: number = DEFAULT_COOLDOWN_DAYS,
  now: Date = new Date()
): T[] {
  const windowMs = cooldownDays * DAY_MS;

  return leads.filter((lead) => {
    if (!lead.company_domain) return true;

    const lastContact = lastContactByDomain.get(lead.company_domain);
    if (!lastContact) return true;

    const contactedAt = parseContactTimestamp(lastContact);
    if (!contactedAt) {
      console.warn(`   ⚠️  Unreadable contact date for ${lead.company_domain}: "${lastContact}" - not filtering`);
      return true;
    }

    return now.getTime() - contactedAt.getTime() > windowMs;
  });
}
