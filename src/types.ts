/**
 * Shared type definitions
 *
 * Parser and file I/O options used across the library, with their arktype
 * schemas. VCF record types live in `formats/vcf/types`.
 */

import { type } from "arktype";

// =============================================================================
// PARSER TYPES
// =============================================================================

/**
 * Base parser configuration shared by every format parser
 */
export interface ParserOptions {
  /** Maximum line length before reporting an error */
  maxLineLength?: number;
  /** Whether parsed entries carry their source line number */
  trackLineNumbers?: boolean;
  /** AbortController signal for cancelling parsing operations */
  signal?: AbortSignal;
  /** Custom error handler */
  onError?: (error: string, lineNumber?: number) => void;
  /** Custom warning handler */
  onWarning?: (warning: string, lineNumber?: number) => void;
}

// =============================================================================
// FILE I/O TYPES
// =============================================================================

/**
 * File reading configuration options
 */
export interface FileReaderOptions {
  /** Buffer size for streaming reads (default: 64KB) */
  readonly bufferSize?: number;
  /** Text encoding for file content (default: 'utf8') */
  readonly encoding?: "utf8" | "binary" | "ascii";
  /** Maximum file size to prevent memory exhaustion (default: 100MB) */
  readonly maxFileSize?: number;
}

/**
 * Validated file path
 */
export type FilePath = typeof FilePathSchema.infer;

/**
 * File metadata returned by the reader
 */
export interface FileMetadata {
  readonly path: FilePath;
  readonly size: number;
  readonly lastModified: Date;
  readonly extension: string;
}

/**
 * File validation result with detailed feedback
 */
export interface FileValidationResult {
  readonly isValid: boolean;
  readonly metadata?: FileMetadata;
  readonly error?: string;
}

/**
 * Result of splitting a text buffer into lines
 */
export interface LineProcessingResult {
  /** Complete lines extracted from buffer */
  readonly lines: string[];
  /** Incomplete line remainder to carry forward */
  readonly remainder: string;
}

// =============================================================================
// SCHEMAS
// =============================================================================

/**
 * File path validation: non-empty, no null bytes, no shell metacharacters,
 * no directory traversal
 */
export const FilePathSchema = type("string>0").narrow((path, ctx) => {
  if (path.includes("\0")) {
    return ctx.reject("a path without null characters");
  }
  if (/[<>"|*?]/.test(path)) {
    return ctx.reject("a path without <>\"|*? characters");
  }
  if (path.replace(/\\/g, "/").includes("../")) {
    return ctx.reject("a path without directory traversal");
  }
  return true;
});

/**
 * File reader options validation schema
 */
export const FileReaderOptionsSchema = type({
  "bufferSize?": "number>=1024",
  "encoding?": "'utf8'|'binary'|'ascii'",
  "maxFileSize?": "number>0",
});
