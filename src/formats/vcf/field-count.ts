/**
 * Number-token codec for INFO and FORMAT declarations
 *
 * @module vcf/field-count
 */

import { FieldCountInvalidError } from "../../errors";
import { FIELD_COUNT_CODES } from "./constants";
import type { FieldCount } from "./types";

const SIGNED_INTEGER = /^[+-]?\d+$/;

function frozen(fieldCount: FieldCount): FieldCount {
  return Object.freeze(fieldCount);
}

const UNKNOWN = frozen({ kind: "unknown" });
const PER_ALT_ALLELE = frozen({ kind: "perAltAllele" });
const PER_GENOTYPE = frozen({ kind: "perGenotype" });
const PER_ALLELE_INCLUDING_REF = frozen({ kind: "perAlleleIncludingRef" });

/**
 * Parse a signed integer literal, rejecting anything `parseInt` would
 * silently truncate ("12abc", "1.5")
 *
 * @returns The integer, or undefined when the token is not a literal
 */
export function parseIntegerLiteral(token: string): number | undefined {
  if (!SIGNED_INTEGER.test(token)) return undefined;
  const value = Number.parseInt(token, 10);
  return Number.isSafeInteger(value) ? value : undefined;
}

/**
 * Decode a Number token
 *
 * @param token Text of the `Number=` attribute
 * @throws {FieldCountInvalidError} If the token is neither a code nor an integer
 *
 * @example
 * ```typescript
 * parseFieldCount("A"); // { kind: "perAltAllele" }
 * parseFieldCount("3"); // { kind: "fixed", count: 3 }
 * ```
 *
 * @public
 */
export function parseFieldCount(token: string): FieldCount {
  switch (token) {
    case FIELD_COUNT_CODES.UNKNOWN:
      return UNKNOWN;
    case FIELD_COUNT_CODES.PER_ALT_ALLELE:
      return PER_ALT_ALLELE;
    case FIELD_COUNT_CODES.PER_GENOTYPE:
      return PER_GENOTYPE;
    case FIELD_COUNT_CODES.PER_ALLELE_INCLUDING_REF:
      return PER_ALLELE_INCLUDING_REF;
  }

  const count = parseIntegerLiteral(token);
  if (count === undefined) {
    throw new FieldCountInvalidError(token);
  }
  return frozen({ kind: "fixed", count });
}

/**
 * Encode a field count back into its Number token
 *
 * @public
 */
export function formatFieldCount(fieldCount: FieldCount): string {
  switch (fieldCount.kind) {
    case "fixed":
      return String(fieldCount.count);
    case "perAltAllele":
      return FIELD_COUNT_CODES.PER_ALT_ALLELE;
    case "perGenotype":
      return FIELD_COUNT_CODES.PER_GENOTYPE;
    case "perAlleleIncludingRef":
      return FIELD_COUNT_CODES.PER_ALLELE_INCLUDING_REF;
    case "unknown":
      return FIELD_COUNT_CODES.UNKNOWN;
  }
}

/**
 * Fixed-count constructor
 *
 * @public
 */
export function fixedCount(count: number): FieldCount {
  return frozen({ kind: "fixed", count });
}
