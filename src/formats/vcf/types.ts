/**
 * Core VCF header type definitions
 *
 * Records recovered from `##INFO`, `##FILTER`, `##ALT`, `##FORMAT` and
 * `##contig` declarations, plus the generic `##key=value` metadata.
 *
 * @module vcf/types
 */

import type { ParserOptions } from "../../types";
import type { HeaderMetadataStore } from "./store";

/**
 * Cardinality of an INFO or FORMAT field, decoded from its Number token
 *
 * @public
 */
export type FieldCount =
  | { readonly kind: "fixed"; readonly count: number }
  /** `A`: one value per alternate allele */
  | { readonly kind: "perAltAllele" }
  /** `G`: one value per possible genotype */
  | { readonly kind: "perGenotype" }
  /** `R`: one value per allele, reference included */
  | { readonly kind: "perAlleleIncludingRef" }
  /** `.`: varies or is unknown */
  | { readonly kind: "unknown" };

/**
 * Scanner state for the quoted key/value tokenizer
 */
export enum AttributeParseState {
  READING_KEY,
  READING_VALUE,
  READING_QUOTED_VALUE,
}

/**
 * Value types allowed in INFO and FORMAT declarations
 *
 * @public
 */
export type ValueType = "Integer" | "Float" | "Flag" | "Character" | "String";

/**
 * Header tags with a fixed declaration grammar
 *
 * @public
 */
export type StructuredTag = "INFO" | "FILTER" | "ALT" | "FORMAT" | "contig";

/**
 * Classification of a raw header line
 *
 * @public
 */
export type LineKind = StructuredTag | "generic";

/** @public */
export interface InfoRecord {
  readonly id: string;
  readonly number: FieldCount;
  readonly type: ValueType;
  readonly description: string;
  /** Annotation source, e.g. "dbsnp" */
  readonly source?: string;
  /** Annotation source version */
  readonly version?: string;
}

/** @public */
export interface FilterRecord {
  readonly id: string;
  readonly description: string;
}

/** @public */
export interface AltRecord {
  readonly id: string;
  readonly description: string;
}

/** @public */
export interface FormatRecord {
  readonly id: string;
  readonly number: FieldCount;
  readonly type: ValueType;
  readonly description: string;
}

/** @public */
export interface ContigRecord {
  readonly id: string;
  readonly length?: number;
}

/**
 * Value of a generic metadata line
 *
 * - `scalar`: `##key=value`
 * - `attributes`: `##key=<A=1,B="x">`, attribute order as written
 * - `none`: a line with no `=` at all
 *
 * @public
 */
export type GenericValue =
  | { readonly kind: "scalar"; readonly value: string }
  | { readonly kind: "attributes"; readonly attributes: ReadonlyMap<string, string> }
  | { readonly kind: "none" };

/** @public */
export interface GenericMetadata {
  readonly key: string;
  readonly value: GenericValue;
}

/**
 * Record type stored for each structured tag
 *
 * @public
 */
export interface StructuredRecordMap {
  INFO: InfoRecord;
  FILTER: FilterRecord;
  ALT: AltRecord;
  FORMAT: FormatRecord;
  contig: ContigRecord;
}

/**
 * One parsed header line, tagged by kind
 *
 * @public
 */
export type HeaderEntry = (
  | { readonly kind: "INFO"; readonly record: InfoRecord }
  | { readonly kind: "FILTER"; readonly record: FilterRecord }
  | { readonly kind: "ALT"; readonly record: AltRecord }
  | { readonly kind: "FORMAT"; readonly record: FormatRecord }
  | { readonly kind: "contig"; readonly record: ContigRecord }
  | { readonly kind: "generic"; readonly record: GenericMetadata }
) & {
  /** Source line number, when tracking is enabled */
  readonly lineNumber?: number;
};

/**
 * Outcome of feeding one line to the header store
 *
 * @public
 */
export type LineOutcome = "accepted" | "headerEnded";

/**
 * Policy for a repeated singular key such as `fileformat`
 *
 * @public
 */
export type SingularMetadataPolicy = "overwrite" | "reject";

/**
 * Header store configuration
 *
 * @public
 */
export interface HeaderStoreOptions {
  /** What to do when a singular key repeats (default: "overwrite") */
  singularMetadata?: SingularMetadataPolicy;
  /** Warn when a reserved INFO/FORMAT id is declared with another type (default: true) */
  warnOnReservedMismatch?: boolean;
  /** Whether returned entries carry their line number (default: true) */
  trackLineNumbers?: boolean;
  /** Warning sink for duplicates and reserved-type mismatches */
  onWarning?: (warning: string, lineNumber?: number) => void;
}

/**
 * VCF header parser configuration options
 *
 * @public
 */
export interface VcfHeaderParserOptions extends ParserOptions {
  singularMetadata?: SingularMetadataPolicy;
  warnOnReservedMismatch?: boolean;
}

/**
 * A VCF text split at the end of its header
 *
 * @public
 */
export interface VcfDocument {
  /** Finalized store holding every header line */
  readonly header: HeaderMetadataStore;
  /** Everything from the first non-header line (usually `#CHROM`) on */
  readonly body: string;
}
