import type { EnrichSkipReason, PipelineContext } from '../context.js';
import { classifyCompanyType } from '../../lib/company-type.js';
import { errorMessage } from '../../lib/errors.js';
import type { Lead } from '../../types.js';

type EnrichOutcome = { lead: Lead } | { skip: EnrichSkipReason; detail?: string };

/**
 * Runs the per-lead gates in cost order: the free brand list first, then
 * Hunter lookups, the AI classification, and the contact search and
 * verification last.
 */
async function enrichLead(ctx: PipelineContext, lead: Lead): Promise<EnrichOutcome> {
  const { resolver, sizeClassifier, generateText } = ctx.services;

  if (sizeClassifier.isKnownLargeBrand(lead.company_name)) {
    return { skip: 'large_brand' };
  }

  const domain = lead.company_domain ?? (await resolver.findCompanyDomain(lead.company_name));
  if (!domain) {
    return { skip: 'no_domain' };
  }

  // One lead per domain per run
  if (ctx.claimedDomains.has(domain)) {
    return { skip: 'duplicate_domain', detail: domain };
  }
  ctx.claimedDomains.add(domain);

  const profile = await resolver.getCompanyProfile(domain);
  if (sizeClassifier.classifyEmployeeRange(profile.employee_range)) {
    return { skip: 'large_company', detail: profile.employee_range ?? undefined };
  }

  const companyType = await classifyCompanyType(generateText, {
    company_name: lead.company_name,
    industry: profile.industry,
    description: profile.description,
  });
  if (companyType.is_b2c) {
    return { skip: 'b2c' };
  }

  const contact = await resolver.findDecisionMaker(domain);
  if (!contact) {
    return { skip: 'no_contact', detail: domain };
  }

  const verification = await resolver.verifyEmail(contact.email);
  if (!verification.verified) {
    return { skip: 'unverified', detail: contact.email };
  }

  return {
    lead: {
      ...lead,
      company_domain: domain,
      company_type: 'b2b',
      email: contact.email,
      first_name: contact.first_name || lead.first_name,
      last_name: contact.last_name || lead.last_name,
      title: contact.title || lead.job_title,
      verification_status: verification.status,
      verification_score: verification.score,
    },
  };
}

export async function runEnrich(ctx: PipelineContext): Promise<number> {
  const enriched: Lead[] = [];

  for (const lead of ctx.leads) {
    try {
      const outcome = await enrichLead(ctx, lead);
      if ('lead' in outcome) {
        enriched.push(outcome.lead);
        console.log(`   ✅ ${lead.company_name} → ${outcome.lead.email}`);
      } else {
        ctx.skips[outcome.skip] += 1;
        console.log(`   ⏭️  Skipped ${lead.company_name} - ${outcome.skip}${outcome.detail ? ` (${outcome.detail})` : ''}`);
      }
    } catch (error) {
      ctx.skips.errors += 1;
      console.error(`   ❌ Enrichment failed for ${lead.company_name}: ${errorMessage(error)}`);
    }
  }

  ctx.leads = enriched;

  const { large_brand, no_domain, duplicate_domain, large_company, b2c, no_contact, unverified, errors } = ctx.skips;
  console.log(`\n   📊 Enriched: ${enriched.length} leads`);
  console.log(`      Large brand: ${large_brand}, large company: ${large_company}, B2C: ${b2c}`);
  console.log(`      No domain: ${no_domain}, duplicate domain: ${duplicate_domain}, no contact: ${no_contact}`);
  console.log(`      Unverified email: ${unverified}, errors: ${errors}`);

  return ctx.leads.length;
}
