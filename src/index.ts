/**
 * vcfmeta - VCF header metadata parsing for TypeScript
 *
 * Reads the `##` meta-information block of a VCF file into typed INFO,
 * FILTER, ALT, FORMAT and contig records plus free-form metadata, and
 * writes it back out.
 */

// Error types
export {
  BufferError,
  DuplicateMetadataError,
  ERROR_SUGGESTIONS,
  FieldCountInvalidError,
  FileError,
  getErrorSuggestion,
  HeaderFinalizedError,
  ParseError,
  StreamError,
  StructuredLineMalformedError,
  ValidationError,
  VcfMetaError,
} from "./errors";
// VCF header format
export * from "./formats";
// File I/O infrastructure
export { FileReader } from "./io/file-reader";
export { getPlatform } from "./io/runtime";
export { StreamUtils } from "./io/stream-utils";
// Core types
export type {
  FileMetadata,
  FilePath,
  FileReaderOptions,
  FileValidationResult,
  LineProcessingResult,
  ParserOptions,
} from "./types";
export { FilePathSchema, FileReaderOptionsSchema } from "./types";
