import { describe, it, expect } from 'vitest';
import { buildIdentitySet, dedupeByCompanyName, filterDuplicates, identityKey } from './dedupe.js';

type Candidate = { company_domain: string | null; email: string };

describe('filterDuplicates', () => {
  it('drops a lead whose identity pair is already known', () => {
    const leads: Candidate[] = [
      { company_domain: 'a.com', email: 'x@a.com' },
      { company_domain: 'b.com', email: 'y@b.com' },
    ];
    const existing = new Set([identityKey('a.com', 'x@a.com')]);

    expect(filterDuplicates(leads, existing)).toEqual([{ company_domain: 'b.com', email: 'y@b.com' }]);
  });

  it('keeps everything when nothing is known', () => {
    const leads: Candidate[] = [
      { company_domain: 'example.com', email: 'user@example.com' },
      { company_domain: 'test.com', email: 'user@test.com' },
    ];

    expect(filterDuplicates(leads, new Set())).toEqual(leads);
  });

  it('never removes a lead missing its domain or its email', () => {
    const leads: Candidate[] = [
      { company_domain: null, email: 'x@a.com' },
      { company_domain: 'a.com', email: '' },
    ];
    // Sets that would match any half of these leads
    const existing = new Set([identityKey('a.com', 'x@a.com'), identityKey('a.com', ''), identityKey('', 'x@a.com')]);

    expect(filterDuplicates(leads, existing)).toEqual(leads);
  });

  it('matches exactly, without case folding', () => {
    const leads: Candidate[] = [{ company_domain: 'A.com', email: 'x@a.com' }];
    const existing = new Set([identityKey('a.com', 'x@a.com')]);

    expect(filterDuplicates(leads, existing)).toHaveLength(1);
  });

  it('does not treat a pair as a partial match of another', () => {
    const leads: Candidate[] = [{ company_domain: 'a.com', email: 'y@a.com' }];
    const existing = new Set([identityKey('a.com', 'x@a.com')]);

    expect(filterDuplicates(leads, existing)).toHaveLength(1);
  });

  it('preserves input order and returns the same objects', () => {
    const first = { company_domain: 'c.com', email: 'c@c.com' };
    const second = { company_domain: 'a.com', email: 'a@a.com' };
    const third = { company_domain: 'b.com', email: 'b@b.com' };
    const existing = new Set([identityKey('a.com', 'a@a.com')]);

    const result = filterDuplicates([first, second, third], existing);

    expect(result).toEqual([first, third]);
    expect(result[0]).toBe(first);
  });

  it('returns nothing on a second pass once the survivors are recorded', () => {
    const leads: Candidate[] = [
      { company_domain: 'a.com', email: 'x@a.com' },
      { company_domain: 'b.com', email: 'y@b.com' },
      { company_domain: 'c.com', email: 'z@c.com' },
    ];
    const existing = new Set([identityKey('b.com', 'y@b.com')]);

    const firstPass = filterDuplicates(leads, existing);
    const updated = new Set([...existing, ...buildIdentitySet(firstPass)]);

    expect(filterDuplicates(firstPass, updated)).toEqual([]);
  });

  it('keeps domains and emails containing separator characters apart', () => {
    expect(identityKey('a.com|x', 'y')).not.toBe(identityKey('a.com', 'x|y'));
  });
});

describe('buildIdentitySet', () => {
  it('skips rows lacking either half of the identity', () => {
    const keys = buildIdentitySet([
      { company_domain: 'a.com', email: 'x@a.com' },
      { company_domain: null, email: 'y@b.com' },
      { company_domain: 'c.com', email: null },
      { company_domain: '', email: 'z@d.com' },
    ]);

    expect(keys).toEqual(new Set([identityKey('a.com', 'x@a.com')]));
  });
});

describe('dedupeByCompanyName', () => {
  it('keeps the first record per company and drops nameless ones', () => {
    const jobs = [
      { company_name: 'Acme', job_title: 'VP Sales' },
      { company_name: '', job_title: 'CRO' },
      { company_name: 'Globex', job_title: 'CMO' },
      { company_name: 'Acme', job_title: 'Head of Growth' },
    ];

    const unique = dedupeByCompanyName(jobs, (job) => job.company_name);

    expect(unique).toEqual([
      { company_name: 'Acme', job_title: 'VP Sales' },
      { company_name: 'Globex', job_title: 'CMO' },
    ]);
  });
});
