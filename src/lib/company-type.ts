import type { TextGenerator } from './ai.js';
import { errorMessage } from './errors.js';

export interface CompanyTypeInput {
  company_name: string;
  industry?: string | null;
  description?: string | null;
}

export type CompanyTypeStatus = 'classified' | 'insufficient_data' | 'error';

export interface CompanyTypeResult {
  is_b2c: boolean;
  reason: string;
  status: CompanyTypeStatus;
}

const DESCRIPTION_LIMIT = 500;

function buildClassificationPrompt(input: CompanyTypeInput): string {
  const context = [`Company: ${input.company_name}`];
  if (input.industry) context.push(`Industry: ${input.industry}`);
  if (input.description) context.push(`Description: ${input.description.slice(0, DESCRIPTION_LIMIT)}`);

  return `Analyze this company and decide whether it is B2B or B2C.

${context.join('\n')}

B2B = sells products or services to OTHER BUSINESSES (software, consulting, enterprise tools, professional services, industrial supply...)
B2C = sells products or services directly to CONSUMERS (retail, restaurants, consumer apps, e-commerce to individuals...)

Some companies do both. If the company primarily serves businesses OR has significant B2B operations, classify it as B2B.

Respond with ONLY one word: B2B or B2C`;
}

/**
 * B2C/B2B gate. Every failure mode answers is_b2c=false so an unreliable
 * signal never removes a lead; only a `classified` result can reject.
 */
export async function classifyCompanyType(
  generate: TextGenerator,
  input: CompanyTypeInput
): Promise<CompanyTypeResult> {
  if (!input.industry && !input.description) {
    return { is_b2c: false, reason: 'No data available', status: 'insufficient_data' };
  }

  try {
    const reply = await generate({
      prompt: buildClassificationPrompt(input),
      temperature: 0,
      maxOutputTokens: 10,
    });
    const isB2c = reply.trim().toUpperCase().includes('B2C');
    return { is_b2c: isB2c, reason: 'AI classification', status: 'classified' };
  } catch (error) {
    const message = errorMessage(error);
    console.warn(`   ⚠️  B2C check failed for ${input.company_name}: ${message}`);
    return { is_b2c: false, reason: `Error: ${message}`, status: 'error' };
  }
}
