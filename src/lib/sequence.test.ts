import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { TextGenerator } from './ai.js';
import {
  buildFallbackSequence,
  createSequenceGenerator,
  determineSeniority,
  generateAiSequence,
  loadSequenceLibrary,
  parseSequenceReply,
  pickTemplateSequence,
} from './sequence.js';
import type { SequenceLibrary } from './sequence.js';
import type { Lead } from '../types.js';

const library: SequenceLibrary = {
  versions: [
    { key: 'first', name: 'First', subject_line: 'one', email_1: '{{greeting}}Hello', email_2: 'b', email_3: 'c' },
    { key: 'second', name: 'Second', subject_line: 'two', email_1: '{{greeting}}Bonjour', email_2: 'e', email_3: 'f' },
  ],
  fallback: {
    subject_line: '{setup|infra} email',
    email_1: '{{company_name}} hires a {{job_title}}',
    email_1_ps: 'PS: {{unknown}} stays',
    email_2: 'follow-up',
    email_3: 'last',
  },
};

function lead(overrides: Partial<Lead> = {}): Lead {
  return {
    company_name: 'Acme',
    company_domain: 'acme.io',
    email: 'jane@acme.io',
    first_name: 'Jane',
    last_name: 'Doe',
    title: 'VP Sales',
    job_title: 'Head of Growth',
    job_url: '',
    location: '',
    source_keyword: '',
    posted_date: '',
    source: 'linkedin_jobs',
    linkedin_url: '',
    subject_line: '',
    email_1: '',
    email_1_ps: '',
    email_2: '',
    email_3: '',
    ...overrides,
  };
}

const validReply = {
  subject_line: 'quick question',
  email_1: 'first',
  email_1_ps: 'PS: hi',
  email_2: 'second',
  email_3: 'third',
};

describe('parseSequenceReply', () => {
  it('parses a bare JSON reply', () => {
    expect(parseSequenceReply(JSON.stringify(validReply))).toEqual(validReply);
  });

  it('parses a fenced reply', () => {
    const text = '```json\n' + JSON.stringify(validReply) + '\n```';
    expect(parseSequenceReply(text)).toEqual(validReply);
  });

  it('re-extracts JSON wrapped in prose', () => {
    const text = `Here is the sequence:\n${JSON.stringify(validReply)}\nGood luck!`;
    expect(parseSequenceReply(text)).toEqual(validReply);
  });

  it('defaults a missing PS to an empty string', () => {
    const { email_1_ps: _ps, ...withoutPs } = validReply;
    expect(parseSequenceReply(JSON.stringify(withoutPs))).toEqual({ ...validReply, email_1_ps: '' });
  });

  it('rejects replies missing a required email', () => {
    expect(parseSequenceReply(JSON.stringify({ ...validReply, email_3: '' }))).toBeNull();
    expect(parseSequenceReply(JSON.stringify({ ...validReply, email_2: 42 }))).toBeNull();
  });

  it('returns null on garbage', () => {
    expect(parseSequenceReply('not json at all')).toBeNull();
    expect(parseSequenceReply('{ broken')).toBeNull();
  });
});

describe('buildFallbackSequence', () => {
  it('fills company and job title, leaving spintax and unknown placeholders', () => {
    expect(buildFallbackSequence(library, lead())).toEqual({
      subject_line: '{setup|infra} email',
      email_1: 'Acme hires a Head of Growth',
      email_1_ps: 'PS: {{unknown}} stays',
      email_2: 'follow-up',
      email_3: 'last',
    });
  });

  it('uses defaults when company or job title are empty', () => {
    const sequence = buildFallbackSequence(library, lead({ company_name: '', job_title: '' }));
    expect(sequence.email_1).toBe('votre entreprise hires a commercial');
  });
});

describe('pickTemplateSequence', () => {
  it('selects by the random source and greets by first name', () => {
    const result = pickTemplateSequence(library, lead(), () => 0.75);
    expect(result).toEqual({
      sequence: { subject_line: 'two', email_1: 'Jane,\n\nBonjour', email_1_ps: '', email_2: 'e', email_3: 'f' },
      origin: 'template',
      version: 'second',
    });
  });

  it('drops the greeting without a first name', () => {
    const result = pickTemplateSequence(library, lead({ first_name: '' }), () => 0);
    expect(result.sequence.email_1).toBe('Hello');
    expect(result.version).toBe('first');
  });

  it('clamps a random value of 1 to the last version', () => {
    expect(pickTemplateSequence(library, lead(), () => 1).version).toBe('second');
  });
});

describe('generateAiSequence', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  it('returns the parsed model sequence', async () => {
    const generate = vi.fn<TextGenerator>().mockResolvedValue(JSON.stringify(validReply));

    const result = await generateAiSequence(generate, library, lead(), { language: 'French', senderName: 'Sam' });

    expect(result).toEqual({ sequence: validReply, origin: 'ai' });
    const request = generate.mock.calls[0][0];
    expect(request.system).toContain('Write every email in French');
    expect(request.prompt).toContain('Company: Acme');
    expect(request.prompt).toContain('Contact: Jane Doe, VP Sales');
    expect(request.prompt).toContain('Seniority: Director/VP');
    expect(request.prompt).toContain('Sign as: Sam');
  });

  it('falls back when the reply cannot be parsed', async () => {
    const generate = vi.fn<TextGenerator>().mockResolvedValue('Sorry, I cannot help with that.');

    const result = await generateAiSequence(generate, library, lead(), { language: 'French', senderName: '' });

    expect(result.origin).toBe('fallback');
    expect(result.sequence.email_1).toBe('Acme hires a Head of Growth');
  });

  it('falls back when the generator throws', async () => {
    const generate = vi.fn<TextGenerator>().mockRejectedValue(new Error('timeout'));

    const result = await generateAiSequence(generate, library, lead(), { language: 'French', senderName: '' });

    expect(result).toEqual({ sequence: buildFallbackSequence(library, lead()), origin: 'fallback' });
  });
});

describe('createSequenceGenerator', () => {
  it('never calls the text generator in templates mode', async () => {
    const generate = vi.fn<TextGenerator>();
    const generator = createSequenceGenerator({
      mode: 'templates',
      generate,
      library,
      language: 'French',
      senderName: '',
      random: () => 0,
    });

    const result = await generator.generate(lead());

    expect(result.origin).toBe('template');
    expect(generate).not.toHaveBeenCalled();
  });

  it('uses the text generator in ai mode', async () => {
    const generate = vi.fn<TextGenerator>().mockResolvedValue(JSON.stringify(validReply));
    const generator = createSequenceGenerator({ mode: 'ai', generate, library, language: 'English', senderName: '' });

    expect((await generator.generate(lead())).origin).toBe('ai');
    expect(generate).toHaveBeenCalledTimes(1);
  });
});

describe('determineSeniority', () => {
  it.each([
    ['Chief Revenue Officer', 'C-Level/Founder'],
    ['CRO', 'C-Level/Founder'],
    ['Head of Sales', 'Director/VP'],
    ['Demand Generation Manager', 'Manager/Lead'],
    ['Account Executive', 'Individual Contributor'],
  ])('%s -> %s', (title, expected) => {
    expect(determineSeniority(title)).toBe(expected);
  });
});

describe('loadSequenceLibrary', () => {
  it('loads the bundled versions and fallback', () => {
    const bundled = loadSequenceLibrary();
    expect(bundled.versions.map((version) => version.key)).toEqual([
      'shared_infra',
      'hiring_roi',
      'deliverability',
      'pattern_interrupt',
    ]);
    expect(bundled.fallback.email_1).toContain('{{company_name}}');
  });
});
