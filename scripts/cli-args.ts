import type { SequenceMode } from '../src/config.js';
import type { LeadSourceKind } from '../src/pipeline/context.js';

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface PipelineArgs {
  count?: number;
  keywords?: string[];
  location?: string;
  geoId?: string;
  source?: LeadSourceKind;
  searchUrl?: string;
  cooldownDays?: number;
  sequenceMode?: SequenceMode;
}

export interface SendArgs {
  count?: number;
  yes: boolean;
}

/**
 * Groups argv into `--flag value...` pairs. A flag's values run until the
 * next `--` token.
 */
function groupFlags(argv: string[]): Map<string, string[]> {
  const flags = new Map<string, string[]>();
  let current: string[] | null = null;

  for (const token of argv) {
    if (token.startsWith('--')) {
      current = [];
      flags.set(token.slice(2), current);
    } else if (current) {
      current.push(token);
    } else {
      throw new UsageError(`Unexpected argument: ${token}`);
    }
  }
  return flags;
}

function single(flags: Map<string, string[]>, name: string): string | undefined {
  const values = flags.get(name);
  if (values === undefined) return undefined;
  if (values.length !== 1) {
    throw new UsageError(`--${name} takes exactly one value`);
  }
  return values[0];
}

function positiveInteger(flags: Map<string, string[]>, name: string): number | undefined {
  const raw = single(flags, name);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new UsageError(`--${name} must be a whole number, got "${raw}"`);
  }
  return value;
}

function rejectUnknown(flags: Map<string, string[]>, known: string[]): void {
  for (const name of flags.keys()) {
    if (!known.includes(name)) {
      throw new UsageError(`Unknown option: --${name}`);
    }
  }
}

export function parsePipelineArgs(argv: string[]): PipelineArgs {
  const flags = groupFlags(argv);
  rejectUnknown(flags, [
    'count',
    'keywords',
    'location',
    'geo-id',
    'source',
    'search-url',
    'cooldown-days',
    'sequence-mode',
  ]);

  const args: PipelineArgs = {};

  const count = positiveInteger(flags, 'count');
  if (count !== undefined) args.count = count;

  const keywords = flags.get('keywords');
  if (keywords !== undefined) {
    if (keywords.length === 0) throw new UsageError('--keywords needs at least one keyword');
    args.keywords = keywords;
  }

  const location = single(flags, 'location');
  if (location !== undefined) args.location = location;

  const geoId = single(flags, 'geo-id');
  if (geoId !== undefined) args.geoId = geoId;

  const source = single(flags, 'source');
  if (source !== undefined) {
    if (source !== 'jobs' && source !== 'profiles') {
      throw new UsageError(`--source must be jobs or profiles, got "${source}"`);
    }
    args.source = source;
  }

  const searchUrl = single(flags, 'search-url');
  if (searchUrl !== undefined) args.searchUrl = searchUrl;

  const cooldownDays = positiveInteger(flags, 'cooldown-days');
  if (cooldownDays !== undefined) args.cooldownDays = cooldownDays;

  const sequenceMode = single(flags, 'sequence-mode');
  if (sequenceMode !== undefined) {
    if (sequenceMode !== 'ai' && sequenceMode !== 'templates') {
      throw new UsageError(`--sequence-mode must be ai or templates, got "${sequenceMode}"`);
    }
    args.sequenceMode = sequenceMode;
  }

  return args;
}

export function parseSendArgs(argv: string[]): SendArgs {
  const flags = groupFlags(argv);
  rejectUnknown(flags, ['count', 'yes']);

  const yes = flags.get('yes');
  if (yes !== undefined && yes.length > 0) {
    throw new UsageError('--yes takes no value');
  }

  const args: SendArgs = { yes: yes !== undefined };
  const count = positiveInteger(flags, 'count');
  if (count !== undefined) args.count = count;
  return args;
}
