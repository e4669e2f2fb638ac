/**
 * VCF header module exports
 *
 * @example Parse a header and inspect its declarations
 * ```typescript
 * import { VcfHeaderParser } from 'vcfmeta';
 *
 * const { header } = new VcfHeaderParser().readString(vcfText);
 * for (const info of header.info.values()) {
 *   console.log(`${info.id}: ${info.description}`);
 * }
 * ```
 *
 * @module vcf
 */

export { classifyHeaderLine, headerTag, isHeaderLine, isStructuredTag } from "./classifier";
export {
  FIELD_COUNT_CODES,
  HEADER_PREFIX,
  isValueType,
  RESERVED_FORMAT,
  RESERVED_INFO,
  reservedFormatType,
  reservedInfoType,
  SINGULAR_METADATA,
  STRUCTURED_TAGS,
  VALUE_TYPES,
} from "./constants";
export { fixedCount, formatFieldCount, parseFieldCount, parseIntegerLiteral } from "./field-count";
export { VcfHeaderParser } from "./parser";
export {
  NO_VALUE,
  parseAltLine,
  parseContigLine,
  parseFilterLine,
  parseFormatLine,
  parseGenericLine,
  parseHeaderLine,
  parseInfoLine,
} from "./records";
export {
  type AttributePair,
  isQuoted,
  stripOuterDelimiters,
  toAttributeMap,
  tokenizeAttributes,
  unquote,
} from "./state-machine";
export { HeaderMetadataStore } from "./store";
export {
  type AltRecord,
  AttributeParseState,
  type ContigRecord,
  type FieldCount,
  type FilterRecord,
  type FormatRecord,
  type GenericMetadata,
  type GenericValue,
  type HeaderEntry,
  type HeaderStoreOptions,
  type InfoRecord,
  type LineKind,
  type LineOutcome,
  type SingularMetadataPolicy,
  type StructuredRecordMap,
  type StructuredTag,
  type ValueType,
  type VcfDocument,
  type VcfHeaderParserOptions,
} from "./types";
export { VcfHeaderWriter } from "./writer";
