/**
 * VCF Header Constants
 *
 * Header markers, tag names, Number codes and the reserved field tables.
 */

import { type } from "arktype";
import reservedFields from "./reserved-fields.json";
import type { StructuredTag, ValueType } from "./types";

/**
 * Prefix that marks a meta-information line
 */
export const HEADER_PREFIX = "##";

/**
 * Tags parsed with a fixed grammar; everything else is generic metadata
 */
export const STRUCTURED_TAGS: readonly StructuredTag[] = [
  "INFO",
  "FILTER",
  "ALT",
  "FORMAT",
  "contig",
] as const;

/**
 * Type names accepted in INFO and FORMAT declarations
 */
export const VALUE_TYPES: readonly ValueType[] = [
  "Integer",
  "Float",
  "Flag",
  "Character",
  "String",
] as const;

/**
 * Keys expected at most once per header
 */
export const SINGULAR_METADATA: readonly string[] = [
  "fileformat",
  "fileDate",
  "reference",
] as const;

/**
 * Special Number codes
 */
export const FIELD_COUNT_CODES = {
  UNKNOWN: ".",
  PER_ALT_ALLELE: "A",
  PER_GENOTYPE: "G",
  PER_ALLELE_INCLUDING_REF: "R",
} as const;

const ValueTypeSchema = type("'Integer'|'Float'|'Flag'|'Character'|'String'");

const ReservedFieldsSchema = type({
  info: { "[string]": ValueTypeSchema },
  format: { "[string]": ValueTypeSchema },
});

const reserved = ReservedFieldsSchema.assert(reservedFields);

/**
 * INFO ids reserved by VCF 4.x, with their declared types
 */
export const RESERVED_INFO: Readonly<Record<string, ValueType>> = reserved.info;

/**
 * FORMAT ids reserved by VCF 4.x, with their declared types
 */
export const RESERVED_FORMAT: Readonly<Record<string, ValueType>> = reserved.format;

/**
 * Narrow an arbitrary string to a {@link ValueType}
 */
export function isValueType(value: string): value is ValueType {
  return ValueTypeSchema.allows(value);
}

/**
 * Look up the reserved type of an INFO id
 */
export function reservedInfoType(id: string): ValueType | undefined {
  return Object.hasOwn(RESERVED_INFO, id) ? RESERVED_INFO[id] : undefined;
}

/**
 * Look up the reserved type of a FORMAT id
 */
export function reservedFormatType(id: string): ValueType | undefined {
  return Object.hasOwn(RESERVED_FORMAT, id) ? RESERVED_FORMAT[id] : undefined;
}
