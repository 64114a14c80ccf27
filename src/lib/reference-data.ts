import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { isRecord } from '../utils/parsing.js';

export interface CompanySizeReference {
  brands: string[];
  largeEmployeeRanges: string[];
}

const DEFAULT_REFERENCE_PATH = fileURLToPath(new URL('../../data/company-size.json', import.meta.url));

function stringList(value: unknown, field: string, path: string): string[] {
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new Error(`${path}: "${field}" must be an array of strings`);
  }
  return value;
}

/**
 * Loads the disqualification list and large employee-range tokens from JSON.
 * The file can be swapped (DISQUALIFICATION_LIST_PATH) without touching code.
 */
export function loadReferenceData(path: string = DEFAULT_REFERENCE_PATH): CompanySizeReference {
  const parsed: unknown = JSON.parse(readFileSync(path, 'utf8'));
  if (!isRecord(parsed)) {
    throw new Error(`${path}: expected a JSON object`);
  }
  return {
    brands: stringList(parsed.brands, 'brands', path),
    largeEmployeeRanges: stringList(parsed.largeEmployeeRanges, 'largeEmployeeRanges', path),
  };
}
