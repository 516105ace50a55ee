import type { FormFactor } from "../../platform/catalog/graph";

/**
 * Pairwise compatibility predicates shared by edge generation, candidate
 * filtering and build validation.
 */

// Spellings folded before matching so the token test sees one form per factor.
const FORM_FACTOR_SPELLINGS: ReadonlyArray<readonly [RegExp, string]> = [
  [/MINI-ITX/g, "ITX"],
  [/M-ATX/g, "MATX"],
  [/EATX/g, "E-ATX"],
];

const FORM_FACTOR_TOKENS: Record<FormFactor, RegExp> = {
  "E-ATX": /(?<![A-Z0-9])E-ATX(?![A-Z0-9])/,
  ATX: /(?<![A-Z0-9-])ATX(?![A-Z0-9])/,
  MATX: /(?<![A-Z0-9])MATX(?![A-Z0-9])/,
  ITX: /(?<![A-Z0-9-])ITX(?![A-Z0-9])/,
};

/**
 * True when a case's raw text mentions the board's form factor as a
 * standalone token. "ATX" inside "E-ATX" or "MATX" does not count.
 */
export function caseMentionsFormFactor(caseRaw: string, formFactor: FormFactor): boolean {
  let text = caseRaw.toUpperCase();
  for (const [pattern, replacement] of FORM_FACTOR_SPELLINGS) {
    text = text.replace(pattern, replacement);
  }
  return FORM_FACTOR_TOKENS[formFactor].test(text);
}

/** Equality requirement; an unknown value on either side passes. */
export function valuesMatch(required: string | undefined, actual: string | undefined): boolean {
  return required === undefined || actual === undefined || required === actual;
}

/** Numeric requirement; an unknown capacity fails once a demand is known. */
export function capacityCovers(capacity: number | undefined, demand: number | undefined): boolean {
  if (demand === undefined) return true;
  return capacity !== undefined && capacity >= demand;
}
