import { describe, it, expect } from 'vitest';
import { InMemoryProspectStore, makeLead } from './fakes.js';

describe('InMemoryProspectStore', () => {
  it('rejects an insert that repeats a stored (company_domain, email) pair', async () => {
    const store = new InMemoryProspectStore([makeLead({ company_domain: 'acme.com', email: 'jane@acme.com' })]);

    await expect(
      store.insertProspects([
        makeLead({ company_domain: 'globex.com', email: 'joe@globex.com' }),
        makeLead({ company_domain: 'acme.com', email: 'jane@acme.com' }),
      ])
    ).rejects.toThrow('duplicate key value violates unique constraint (acme.com, jane@acme.com)');
    expect(store.rows).toHaveLength(1);
  });

  it('accepts another contact at a stored domain', async () => {
    const store = new InMemoryProspectStore([makeLead({ company_domain: 'acme.com', email: 'jane@acme.com' })]);

    expect(await store.insertProspects([makeLead({ company_domain: 'acme.com', email: 'max@acme.com' })])).toBe(1);
  });
});
