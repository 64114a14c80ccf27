import type { CompanySizeReference } from './reference-data.js';

export interface CorporateSizeClassifier {
  /** Case-insensitive substring match against the disqualification list. */
  isKnownLargeBrand(companyName: string | null | undefined): boolean;
  /** Exact match against the 500+ employee range tokens. Unknown tokens are not large. */
  classifyEmployeeRange(rangeToken: string | null | undefined): boolean;
}

export function createCorporateSizeClassifier(reference: CompanySizeReference): CorporateSizeClassifier {
  const brands = reference.brands
    .map((brand) => brand.trim().toLowerCase())
    .filter((brand) => brand.length > 0);
  const largeRanges = new Set(reference.largeEmployeeRanges);

  return {
    isKnownLargeBrand(companyName) {
      if (!companyName) return false;
      const companyLower = companyName.toLowerCase();
      return brands.some((brand) => companyLower.includes(brand));
    },

    classifyEmployeeRange(rangeToken) {
      if (!rangeToken) return false;
      return largeRanges.has(rangeToken);
    },
  };
}
