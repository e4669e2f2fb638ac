/**
 * VCF header parser
 *
 * Reads the `##` meta-information lines at the top of a VCF file into a
 * {@link HeaderMetadataStore}. Reading stops at the first line that is not a
 * header line, normally `#CHROM`; the data records are never touched.
 *
 * @module vcf/parser
 */

import { type } from "arktype";
import { StreamError, ValidationError } from "../../errors";
import { createStream, readToString } from "../../io/file-reader";
import { readLines } from "../../io/stream-utils";
import type { FileReaderOptions } from "../../types";
import { AbstractParser } from "../abstract-parser";
import { isHeaderLine } from "./classifier";
import { HeaderMetadataStore } from "./store";
import type { HeaderEntry, VcfDocument, VcfHeaderParserOptions } from "./types";

/**
 * ArkType validation for VCF header parser options
 */
const VcfHeaderParserOptionsSchema = type({
  "maxLineLength?": "number>0",
  "trackLineNumbers?": "boolean",
  "singularMetadata?": "'overwrite'|'reject'",
  "warnOnReservedMismatch?": "boolean",
}).narrow((options, ctx) => {
  if (options.maxLineLength !== undefined && options.maxLineLength > 10_000_000) {
    return ctx.reject("maxLineLength cannot exceed 10MB");
  }
  return true;
});

/**
 * Streaming VCF header parser
 *
 * @example Entries as they are read
 * ```typescript
 * const parser = new VcfHeaderParser();
 * for await (const entry of parser.parseFile("calls.vcf")) {
 *   if (entry.kind === "INFO") console.log(entry.record.id);
 * }
 * ```
 *
 * @example The whole header at once
 * ```typescript
 * const { header, body } = new VcfHeaderParser().readString(text);
 * header.get("FORMAT", "GT")?.description;
 * body.startsWith("#CHROM"); // true
 * ```
 *
 * @public
 */
export class VcfHeaderParser extends AbstractParser<HeaderEntry, VcfHeaderParserOptions> {
  constructor(options: VcfHeaderParserOptions = {}) {
    const validationResult = VcfHeaderParserOptionsSchema(options);
    if (validationResult instanceof type.errors) {
      throw new ValidationError(`Invalid VCF parser options: ${validationResult.summary}`);
    }
    super(options);
  }

  protected override getDefaultOptions(): Partial<VcfHeaderParserOptions> {
    return {
      singularMetadata: "overwrite",
      warnOnReservedMismatch: true,
    };
  }

  protected override getFormatName(): string {
    return "VCF";
  }

  /**
   * Parse header entries from string data
   */
  override async *parseString(data: string): AsyncIterable<HeaderEntry> {
    yield* this.parseLines(data.split(/\r\n|\r|\n/), this.createStore());
  }

  /**
   * Parse header entries from a byte stream. The stream is read only as far
   * as the end of the header.
   */
  override async *parse(stream: ReadableStream<Uint8Array>): AsyncIterable<HeaderEntry> {
    yield* this.parseLines(readLines(stream), this.createStore());
  }

  /**
   * Parse header entries from a file
   *
   * @throws {FileError} If the file cannot be opened
   */
  override async *parseFile(
    filePath: string,
    options?: FileReaderOptions
  ): AsyncIterable<HeaderEntry> {
    if (filePath.length === 0) {
      throw new ValidationError("filePath cannot be empty");
    }

    const stream = await createStream(filePath, options);
    let streamFailed = false;
    try {
      yield* this.parseLines(readLines(stream, options?.encoding), this.createStore());
    } catch (error) {
      streamFailed = error instanceof StreamError;
      throw error;
    } finally {
      // the body is never read
      if (!streamFailed) await stream.cancel();
    }
  }

  /**
   * Split text into its header store and the body that follows
   *
   * @returns The finalized store and the text from the first non-header line
   *   on, or "" when the input is all header
   * @throws {StructuredLineMalformedError} If a structured line is malformed
   */
  readString(data: string): VcfDocument {
    const store = this.createStore();
    const lineBreak = /\r\n|\r|\n/g;
    let start = 0;
    let lineNumber = 0;

    while (true) {
      this.checkAborted();
      lineBreak.lastIndex = start;
      const match = lineBreak.exec(data);
      const end = match === null ? data.length : match.index;
      const line = data.slice(start, end);
      lineNumber++;

      if (
        this.withinLineLimit(line, lineNumber) &&
        store.ingest(line, lineNumber) === "headerEnded"
      ) {
        return { header: store, body: data.slice(start) };
      }
      if (match === null) break;
      start = end + match[0].length;
    }

    store.finalize();
    return { header: store, body: "" };
  }

  /**
   * Build a store from lines, stopping at the first non-header line
   */
  async readLines(lines: AsyncIterable<string> | Iterable<string>): Promise<HeaderMetadataStore> {
    const store = this.createStore();
    let lineNumber = 0;

    for await (const line of lines) {
      this.checkAborted();
      lineNumber++;
      if (
        this.withinLineLimit(line, lineNumber) &&
        store.ingest(line, lineNumber) === "headerEnded"
      ) {
        return store;
      }
    }

    store.finalize();
    return store;
  }

  /**
   * Read a VCF file and split it into header and body
   *
   * @throws {FileError} If the file cannot be read or exceeds `maxFileSize`
   */
  async readFile(filePath: string, options?: FileReaderOptions): Promise<VcfDocument> {
    if (filePath.length === 0) {
      throw new ValidationError("filePath cannot be empty");
    }
    return this.readString(await readToString(filePath, options));
  }

  private async *parseLines(
    lines: AsyncIterable<string> | Iterable<string>,
    store: HeaderMetadataStore
  ): AsyncIterable<HeaderEntry> {
    let lineNumber = 0;

    for await (const line of lines) {
      this.checkAborted();
      lineNumber++;
      if (!this.withinLineLimit(line, lineNumber)) continue;

      const entry = store.ingestEntry(line, lineNumber);
      if (entry === undefined) return;
      yield entry;
    }

    store.finalize();
  }

  private withinLineLimit(line: string, lineNumber: number): boolean {
    // only header lines are limited; the line that ends the header may be any length
    if (!isHeaderLine(line) || line.length <= this.options.maxLineLength) return true;

    this.options.onError(
      `Line too long (${line.length} > ${this.options.maxLineLength})`,
      lineNumber
    );
    return false;
  }

  private createStore(): HeaderMetadataStore {
    return new HeaderMetadataStore({
      singularMetadata: this.options.singularMetadata,
      warnOnReservedMismatch: this.options.warnOnReservedMismatch,
      trackLineNumbers: this.options.trackLineNumbers,
      onWarning: this.options.onWarning,
    });
  }
}
