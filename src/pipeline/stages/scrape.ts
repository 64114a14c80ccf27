import type { PipelineContext } from '../context.js';
import { pause } from '../context.js';
import { errorMessage } from '../../lib/errors.js';
import type { RawLeadRecord } from '../../types.js';

async function scrapeJobPostings(ctx: PipelineContext): Promise<RawLeadRecord[]> {
  const { keywords, location, geoId, scrapeDelayMs } = ctx.options;
  const records: RawLeadRecord[] = [];

  for (const [index, keyword] of keywords.entries()) {
    console.log(`\n   🔍 [${index + 1}/${keywords.length}] Searching: '${keyword}'...`);

    try {
      const postings = await ctx.services.scraper.scrapeJobs(keyword, { location, geoId });
      if (postings.length > 0) {
        console.log(`   ✅ Found ${postings.length} jobs for '${keyword}'`);
      } else {
        console.log(`   ⚠️  No jobs found for '${keyword}'`);
      }
      for (const posting of postings) {
        records.push({ kind: 'job_posting', posting: { ...posting, source_keyword: keyword } });
      }
    } catch (error) {
      console.error(`   ❌ Scrape failed for '${keyword}': ${errorMessage(error)}`);
    }

    if (index < keywords.length - 1 && scrapeDelayMs > 0) {
      await pause(ctx, scrapeDelayMs);
    }
  }

  return records;
}

async function scrapeProfileSearch(ctx: PipelineContext): Promise<RawLeadRecord[]> {
  const { searchUrl, searchLabel, count } = ctx.options;
  if (!searchUrl) {
    throw new Error('A search URL is required for profile scraping');
  }

  console.log(`\n   🔍 Scraping up to ${count} profiles from ${searchUrl.slice(0, 80)}...`);
  try {
    const profiles = await ctx.services.scraper.scrapeProfiles(searchUrl, count);
    console.log(`   ✅ Scraped ${profiles.length} profiles`);
    return profiles.map((profile): RawLeadRecord => ({ kind: 'profile', profile, searchLabel }));
  } catch (error) {
    console.error(`   ❌ Profile scrape failed: ${errorMessage(error)}`);
    return [];
  }
}

export async function runScrape(ctx: PipelineContext): Promise<number> {
  ctx.rawRecords = ctx.options.source === 'profiles'
    ? await scrapeProfileSearch(ctx)
    : await scrapeJobPostings(ctx);

  console.log(`\n   📊 Total records collected: ${ctx.rawRecords.length}`);
  return ctx.rawRecords.length;
}
