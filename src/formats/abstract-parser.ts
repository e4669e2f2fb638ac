/**
 * Abstract base parser with shared option merging and interrupt handling
 *
 * Gives every format parser the same AbortSignal support and the same
 * defaults for line limits and error/warning callbacks, without imposing
 * how the format itself is parsed.
 */

import { ParseError } from "../errors";
import type { FileReaderOptions, ParserOptions } from "../types";

/**
 * Options that always have a value once defaults are merged
 */
interface BaseDefaults {
  maxLineLength: number;
  trackLineNumbers: boolean;
  onError: (error: string, lineNumber?: number) => void;
  onWarning: (warning: string, lineNumber?: number) => void;
}

/**
 * Parser options after merging base defaults, format defaults and user options
 */
export type ResolvedOptions<TOptions extends ParserOptions> = TOptions & BaseDefaults;

/**
 * Abstract parser base class
 *
 * @template T - The entry type this parser produces
 */
export abstract class AbstractParser<T, TOptions extends ParserOptions = ParserOptions> {
  protected readonly options: ResolvedOptions<TOptions>;
  private readonly interruptHandler: InterruptHandler;

  constructor(options: TOptions) {
    const baseDefaults: BaseDefaults = {
      maxLineLength: 1_000_000,
      trackLineNumbers: true,
      onError: (error: string, lineNumber?: number): void => {
        throw new ParseError(error, this.getFormatName(), lineNumber);
      },
      onWarning: (warning: string, lineNumber?: number): void => {
        console.warn(`${this.getFormatName()} Warning (line ${lineNumber}): ${warning}`);
      },
    };

    const formatDefaults = this.getDefaultOptions();

    // Merge in order: base -> format-specific -> user options
    this.options = { ...baseDefaults, ...formatDefaults, ...options };
    this.interruptHandler = new InterruptHandler(this.options.signal);
  }

  /**
   * Format-specific default options
   */
  protected abstract getDefaultOptions(): Partial<TOptions>;

  /**
   * Check if parsing should stop; call this in parsing loops
   */
  protected checkAborted(): void {
    this.interruptHandler.checkAborted();
  }

  /**
   * Parse from a string
   */
  abstract parseString(data: string): AsyncIterable<T>;

  /**
   * Parse from a file
   */
  abstract parseFile(filePath: string, options?: FileReaderOptions): AsyncIterable<T>;

  /**
   * Parse from a byte stream
   */
  abstract parse(stream: ReadableStream<Uint8Array>): AsyncIterable<T>;

  /**
   * Format identifier for error messages and warnings (e.g. "VCF")
   */
  protected abstract getFormatName(): string;
}

/**
 * AbortSignal wrapper shared by all parsers
 */
class InterruptHandler {
  constructor(private readonly signal?: AbortSignal) {}

  /**
   * @throws {ParseError} If operation was aborted
   */
  checkAborted(): void {
    if (this.signal?.aborted) {
      throw new ParseError("Operation was aborted", "ABORTED");
    }
  }
}
