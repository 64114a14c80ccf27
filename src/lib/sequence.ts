import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import type { TextGenerator } from './ai.js';
import { errorMessage } from './errors.js';
import { extractJsonObject, isRecord, readString } from '../utils/parsing.js';
import type { JsonRecord } from '../utils/parsing.js';
import type { EmailSequence, Lead } from '../types.js';
import type { SequenceMode } from '../config.js';

export type SequenceOrigin = 'ai' | 'fallback' | 'template';

export interface GeneratedSequence {
  sequence: EmailSequence;
  origin: SequenceOrigin;
  version?: string;
}

export interface SequenceTemplate {
  key: string;
  name: string;
  subject_line: string;
  email_1: string;
  email_2: string;
  email_3: string;
}

export interface SequenceLibrary {
  versions: SequenceTemplate[];
  fallback: EmailSequence;
}

const DEFAULT_LIBRARY_PATH = fileURLToPath(new URL('../../data/sequences.json', import.meta.url));

function requireText(record: JsonRecord, key: string, path: string): string {
  const value = readString(record, key);
  if (value === undefined) {
    throw new Error(`${path}: "${key}" must be a string`);
  }
  return value;
}

export function loadSequenceLibrary(path: string = DEFAULT_LIBRARY_PATH): SequenceLibrary {
  const parsed: unknown = JSON.parse(readFileSync(path, 'utf8'));
  if (!isRecord(parsed) || !Array.isArray(parsed.versions) || !isRecord(parsed.fallback)) {
    throw new Error(`${path}: expected { versions: [...], fallback: {...} }`);
  }

  const versions = parsed.versions.map((entry: unknown): SequenceTemplate => {
    if (!isRecord(entry)) throw new Error(`${path}: every version must be an object`);
    return {
      key: requireText(entry, 'key', path),
      name: requireText(entry, 'name', path),
      subject_line: requireText(entry, 'subject_line', path),
      email_1: requireText(entry, 'email_1', path),
      email_2: requireText(entry, 'email_2', path),
      email_3: requireText(entry, 'email_3', path),
    };
  });
  if (versions.length === 0) {
    throw new Error(`${path}: at least one sequence version is required`);
  }

  const fallback = parsed.fallback;
  return {
    versions,
    fallback: {
      subject_line: requireText(fallback, 'subject_line', path),
      email_1: requireText(fallback, 'email_1', path),
      email_1_ps: requireText(fallback, 'email_1_ps', path),
      email_2: requireText(fallback, 'email_2', path),
      email_3: requireText(fallback, 'email_3', path),
    },
  };
}

// Replaces {{name}} placeholders; single-brace spintax ({a|b}) is left alone
function fillPlaceholders(text: string, values: Record<string, string>): string {
  return text.replace(/\{\{(\w+)\}\}/g, (placeholder, name: string) => values[name] ?? placeholder);
}

export function buildFallbackSequence(library: SequenceLibrary, lead: Lead): EmailSequence {
  const values = {
    company_name: lead.company_name || 'votre entreprise',
    job_title: lead.job_title || 'commercial',
  };
  const { fallback } = library;
  return {
    subject_line: fillPlaceholders(fallback.subject_line, values),
    email_1: fillPlaceholders(fallback.email_1, values),
    email_1_ps: fillPlaceholders(fallback.email_1_ps, values),
    email_2: fillPlaceholders(fallback.email_2, values),
    email_3: fillPlaceholders(fallback.email_3, values),
  };
}

/**
 * Picks one of the pre-written versions at random. The greeting uses the
 * contact's first name when there is one.
 */
export function pickTemplateSequence(
  library: SequenceLibrary,
  lead: Lead,
  random: () => number = Math.random
): GeneratedSequence {
  const index = Math.min(Math.floor(random() * library.versions.length), library.versions.length - 1);
  const selected = library.versions[index];
  const values = { greeting: lead.first_name ? `${lead.first_name},\n\n` : '' };

  return {
    sequence: {
      subject_line: fillPlaceholders(selected.subject_line, values),
      email_1: fillPlaceholders(selected.email_1, values),
      email_1_ps: '',
      email_2: fillPlaceholders(selected.email_2, values),
      email_3: fillPlaceholders(selected.email_3, values),
    },
    origin: 'template',
    version: selected.key,
  };
}

/**
 * Reads the five sequence fields out of a model reply. Replies wrapped in
 * prose or code fences are re-extracted; anything missing a required email
 * yields null.
 */
export function parseSequenceReply(text: string): EmailSequence | null {
  const parsed = extractJsonObject(text);
  if (!parsed) return null;

  const subjectLine = readString(parsed, 'subject_line');
  const email1 = readString(parsed, 'email_1');
  const email2 = readString(parsed, 'email_2');
  const email3 = readString(parsed, 'email_3');
  if (!subjectLine || !email1 || !email2 || !email3) return null;

  return {
    subject_line: subjectLine,
    email_1: email1,
    email_1_ps: readString(parsed, 'email_1_ps') ?? '',
    email_2: email2,
    email_3: email3,
  };
}

// Determine seniority level from title
export function determineSeniority(title: string): string {
  const titleLower = title.toLowerCase();

  if (/\b(ceo|cro|cmo|coo|founder|chief)\b/.test(titleLower)) {
    return 'C-Level/Founder';
  } else if (titleLower.includes('director') || titleLower.includes('vp') || titleLower.includes('vice president') || titleLower.includes('head of')) {
    return 'Director/VP';
  } else if (titleLower.includes('manager') || titleLower.includes('lead')) {
    return 'Manager/Lead';
  }
  return 'Individual Contributor';
}

function buildSystemPrompt(language: string): string {
  return `You are a B2B cold email specialist. You write short, direct emails with no filler.

THE OFFER:
- Dedicated cold email infrastructure the client owns, plus automated lead sourcing
- Volume spread across several inboxes and domains (1000+ emails/day), SPF/DKIM/DMARC, warm-up, AI personalisation
- Cold outreach is the cheapest, most scalable way to reach an ICP

ANGLE: "Hiring signal"
- The company is hiring a sales, growth or revenue role
- Within 30 days that hire will be sending large outbound volume
- Is their sending infrastructure ready for it?

RULES:
- Email 1: 60-80 words (PS not counted)
- Email 2: 40-50 words, sent 3 days later, different angle (time saved or scalability)
- Email 3: 30-40 words, sent 7 days later, break-up style, door left open
- Subject line: 2 words, lowercase, sounds internal rather than commercial
- No links, no "hope you are well", one soft CTA per email
- Use spintax {option1|option2} for 5-8 variations per email; every combination must read naturally
- Write every email in ${language}

Reply with VALID JSON ONLY (no Markdown, no backticks):
{"subject_line": "...", "email_1": "...", "email_1_ps": "PS: ...", "email_2": "...", "email_3": "..."}`;
}

function buildUserPrompt(lead: Lead, senderName: string): string {
  const contactName = `${lead.first_name} ${lead.last_name}`.trim();
  return `Write the sequence for this prospect:

Company: ${lead.company_name || 'Unknown'}
Role being hired: ${lead.job_title || 'commercial'}
Contact: ${contactName || 'Unknown'}${lead.title ? `, ${lead.title}` : ''}
Seniority: ${determineSeniority(lead.title || lead.job_title)}
${senderName ? `Sign as: ${senderName}` : ''}`.trim();
}

export async function generateAiSequence(
  generate: TextGenerator,
  library: SequenceLibrary,
  lead: Lead,
  opts: { language: string; senderName: string }
): Promise<GeneratedSequence> {
  try {
    const reply = await generate({
      system: buildSystemPrompt(opts.language),
      prompt: buildUserPrompt(lead, opts.senderName),
      temperature: 0.7,
      maxOutputTokens: 1000,
    });

    const sequence = parseSequenceReply(reply);
    if (sequence) {
      return { sequence, origin: 'ai' };
    }
    console.warn(`   ⚠️  Could not parse sequence for ${lead.company_name} - using fallback`);
  } catch (error) {
    console.warn(`   ⚠️  Sequence generation failed for ${lead.company_name}: ${errorMessage(error)} - using fallback`);
  }

  return { sequence: buildFallbackSequence(library, lead), origin: 'fallback' };
}

export interface SequenceGenerator {
  generate(lead: Lead): Promise<GeneratedSequence>;
}

export interface SequenceGeneratorOptions {
  mode: SequenceMode;
  generate: TextGenerator;
  library: SequenceLibrary;
  language: string;
  senderName: string;
  random?: () => number;
}

export function createSequenceGenerator(opts: SequenceGeneratorOptions): SequenceGenerator {
  return {
    async generate(lead) {
      if (opts.mode === 'templates') {
        return pickTemplateSequence(opts.library, lead, opts.random);
      }
      return generateAiSequence(opts.generate, opts.library, lead, {
        language: opts.language,
        senderName: opts.senderName,
      });
    },
  };
}
