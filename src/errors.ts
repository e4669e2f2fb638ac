/**
 * Error handling for VCF header parsing
 *
 * Every error raised by the library derives from {@link VcfMetaError}, so
 * callers can catch one class and still branch on `code`.
 */

/**
 * Base error class for all vcfmeta errors
 */
export class VcfMetaError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "VcfMetaError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.lineNumber !== undefined) {
      msg += ` (line ${this.lineNumber})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Validation errors for invalid options or arguments
 */
export class ValidationError extends VcfMetaError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * Parsing errors for format-specific issues
 */
export class ParseError extends VcfMetaError {
  constructor(
    message: string,
    public readonly format: string,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "PARSE_ERROR", lineNumber, context);
    this.name = "ParseError";
  }
}

/**
 * A structured declaration (INFO, FILTER, ALT, FORMAT, contig) that does not
 * follow its tag's grammar. Parsing of the whole header stops here.
 */
export class StructuredLineMalformedError extends ParseError {
  constructor(
    public readonly tag: string,
    public readonly rawLine: string,
    public readonly reason: string,
    lineNumber?: number
  ) {
    super(`One of the ${tag} lines is malformed: ${reason}`, "VCF", lineNumber, rawLine);
    this.name = "StructuredLineMalformedError";
  }

  override toString(): string {
    let msg = super.toString();
    msg += `\nTag: ${this.tag}`;
    msg += `\nSuggestion: ${ERROR_SUGGESTIONS.MALFORMED_STRUCTURED_LINE}`;
    return msg;
  }
}

/**
 * A Number (or contig length) token that is neither a special code nor an integer
 */
export class FieldCountInvalidError extends ParseError {
  constructor(
    public readonly token: string,
    lineNumber?: number,
    context?: string
  ) {
    super(`Invalid field count '${token}'`, "VCF", lineNumber, context);
    this.name = "FieldCountInvalidError";
  }

  override toString(): string {
    return `${super.toString()}\nSuggestion: ${ERROR_SUGGESTIONS.INVALID_FIELD_COUNT}`;
  }
}

/**
 * A singular metadata key (e.g. fileformat) seen twice under the "reject" policy
 */
export class DuplicateMetadataError extends ParseError {
  constructor(
    public readonly key: string,
    lineNumber?: number,
    context?: string
  ) {
    super(`Metadata key '${key}' may occur at most once`, "VCF", lineNumber, context);
    this.name = "DuplicateMetadataError";
  }
}

/**
 * Ingest called on a store whose header section already ended.
 * This is a caller bug, not a data problem.
 */
export class HeaderFinalizedError extends VcfMetaError {
  constructor(public readonly attemptedLine: string) {
    super(
      "Header store is finalized; no further lines may be ingested",
      "HEADER_FINALIZED",
      undefined,
      `Rejected line: ${attemptedLine.slice(0, 100)}`
    );
    this.name = "HeaderFinalizedError";
  }
}

/**
 * File I/O errors with detailed context
 */
export class FileError extends VcfMetaError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "stat" | "open",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", undefined, context);
    this.name = "FileError";
  }

  /**
   * Create file error with system error context
   */
  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file")) {
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions or run with appropriate privileges";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }
    if (msg.includes("gzip") || msg.includes(".gz")) {
      return "Compressed VCF files must be decompressed before parsing";
    }

    return undefined;
  }

  override toString(): string {
    let msg = super.toString();

    if (this.systemError instanceof Error) {
      msg += `\nSystem Error: ${this.systemError.name}: ${this.systemError.message}`;
    }

    return msg;
  }
}

/**
 * Stream processing errors for I/O operations
 */
export class StreamError extends VcfMetaError {
  constructor(
    message: string,
    public readonly streamType: "read" | "transform",
    public readonly bytesProcessed?: number,
    context?: string
  ) {
    super(message, "STREAM_ERROR", undefined, context);
    this.name = "StreamError";
  }
}

/**
 * Buffer management errors for streaming operations
 */
export class BufferError extends VcfMetaError {
  constructor(
    message: string,
    public readonly bufferSize: number,
    public readonly operation: "overflow",
    context?: string
  ) {
    super(message, "BUFFER_ERROR", undefined, context);
    this.name = "BufferError";
  }
}

/**
 * Error recovery suggestions for common issues
 */
export const ERROR_SUGGESTIONS = {
  MALFORMED_STRUCTURED_LINE:
    'Structured lines look like ##INFO=<ID=DP,Number=1,Type=Integer,Description="Depth">',
  INVALID_FIELD_COUNT: "Number must be an integer or one of '.', 'A', 'G', 'R'",
  DUPLICATE_METADATA: "fileformat, fileDate and reference may appear only once per header",
  MALFORMED_LINE: "Check for extra whitespace, special characters, or encoding issues",
} as const;

/**
 * Get helpful suggestion for common error patterns
 */
export function getErrorSuggestion(error: VcfMetaError): string {
  if (error instanceof StructuredLineMalformedError) {
    return ERROR_SUGGESTIONS.MALFORMED_STRUCTURED_LINE;
  }
  if (error instanceof FieldCountInvalidError) {
    return ERROR_SUGGESTIONS.INVALID_FIELD_COUNT;
  }
  if (error instanceof DuplicateMetadataError) {
    return ERROR_SUGGESTIONS.DUPLICATE_METADATA;
  }
  return ERROR_SUGGESTIONS.MALFORMED_LINE;
}
