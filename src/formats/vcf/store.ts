/**
 * Header metadata store
 *
 * Accumulates parsed header lines into per-kind, insertion-ordered maps and
 * keeps the raw header text. The first line that does not start with `##`
 * finalizes the store.
 *
 * @module vcf/store
 */

import { DuplicateMetadataError, HeaderFinalizedError } from "../../errors";
import { isHeaderLine } from "./classifier";
import { reservedFormatType, reservedInfoType, SINGULAR_METADATA } from "./constants";
import { parseHeaderLine } from "./records";
import type {
  AltRecord,
  ContigRecord,
  FilterRecord,
  FormatRecord,
  GenericValue,
  HeaderEntry,
  HeaderStoreOptions,
  InfoRecord,
  LineOutcome,
  StructuredRecordMap,
  StructuredTag,
  ValueType,
} from "./types";

type RecordMaps = { [K in StructuredTag]: Map<string, StructuredRecordMap[K]> };

/**
 * Ordered store of everything declared in a VCF header
 *
 * @example
 * ```typescript
 * const store = new HeaderMetadataStore();
 * for (const line of lines) {
 *   if (store.ingest(line) === "headerEnded") break;
 * }
 * store.get("INFO", "DP")?.description;
 * ```
 *
 * @public
 */
export class HeaderMetadataStore {
  private readonly recordMaps: RecordMaps = {
    INFO: new Map(),
    FILTER: new Map(),
    ALT: new Map(),
    FORMAT: new Map(),
    contig: new Map(),
  };
  private readonly genericMetadata = new Map<string, GenericValue[]>();
  private readonly headerLines: string[] = [];
  private readonly options: Required<Omit<HeaderStoreOptions, "onWarning">> &
    Pick<HeaderStoreOptions, "onWarning">;
  private finalized = false;

  constructor(options: HeaderStoreOptions = {}) {
    this.options = {
      singularMetadata: options.singularMetadata ?? "overwrite",
      warnOnReservedMismatch: options.warnOnReservedMismatch ?? true,
      trackLineNumbers: options.trackLineNumbers ?? true,
      onWarning: options.onWarning,
    };
  }

  /**
   * Feed the next line of the file
   *
   * @param lineNumber Position of the line in its source; defaults to the
   *   next header line, for callers that feed every line
   * @returns "accepted" for a header line, "headerEnded" for the first line
   *   that is not one (the store is finalized from then on)
   * @throws {HeaderFinalizedError} If called after the header ended
   * @throws {StructuredLineMalformedError} If a structured line breaks its grammar
   * @throws {FieldCountInvalidError} If a Number token is invalid
   */
  ingest(line: string, lineNumber?: number): LineOutcome {
    return this.ingestEntry(line, lineNumber) === undefined ? "headerEnded" : "accepted";
  }

  /**
   * Like {@link ingest}, but returns the parsed entry
   *
   * @returns The entry for a header line, undefined once the header ended
   */
  ingestEntry(
    line: string,
    lineNumber: number = this.headerLines.length + 1
  ): HeaderEntry | undefined {
    if (this.finalized) {
      throw new HeaderFinalizedError(line);
    }
    if (!isHeaderLine(line)) {
      this.finalized = true;
      return undefined;
    }

    const entry = parseHeaderLine(line, lineNumber, this.options.trackLineNumbers);
    this.addEntry(entry, lineNumber);
    this.headerLines.push(line);
    return entry;
  }

  private addEntry(entry: HeaderEntry, lineNumber: number): void {
    switch (entry.kind) {
      case "INFO":
        this.checkReserved(
          "INFO",
          entry.record,
          reservedInfoType(entry.record.id),
          lineNumber
        );
        this.put(this.recordMaps.INFO, "INFO", entry.record, lineNumber);
        break;
      case "FORMAT":
        this.checkReserved(
          "FORMAT",
          entry.record,
          reservedFormatType(entry.record.id),
          lineNumber
        );
        this.put(this.recordMaps.FORMAT, "FORMAT", entry.record, lineNumber);
        break;
      case "FILTER":
        this.put(this.recordMaps.FILTER, "FILTER", entry.record, lineNumber);
        break;
      case "ALT":
        this.put(this.recordMaps.ALT, "ALT", entry.record, lineNumber);
        break;
      case "contig":
        this.put(this.recordMaps.contig, "contig", entry.record, lineNumber);
        break;
      case "generic":
        this.putGeneric(entry.record.key, entry.record.value, lineNumber);
        break;
    }
  }

  /**
   * Mark the header as complete without passing a body line
   */
  finalize(): void {
    this.finalized = true;
  }

  get isFinalized(): boolean {
    return this.finalized;
  }

  /** Number of header lines ingested */
  get lineCount(): number {
    return this.headerLines.length;
  }

  /**
   * Header lines exactly as ingested, each followed by a newline
   */
  get rawHeader(): string {
    return this.headerLines.map((line) => `${line}\n`).join("");
  }

  get info(): ReadonlyMap<string, InfoRecord> {
    return this.recordMaps.INFO;
  }

  get filters(): ReadonlyMap<string, FilterRecord> {
    return this.recordMaps.FILTER;
  }

  get alts(): ReadonlyMap<string, AltRecord> {
    return this.recordMaps.ALT;
  }

  get formats(): ReadonlyMap<string, FormatRecord> {
    return this.recordMaps.FORMAT;
  }

  get contigs(): ReadonlyMap<string, ContigRecord> {
    return this.recordMaps.contig;
  }

  /**
   * Generic metadata by key; a key that appeared several times keeps every
   * value in order
   */
  get generic(): ReadonlyMap<string, readonly GenericValue[]> {
    return this.genericMetadata;
  }

  /**
   * Fetch one structured record by kind and id
   */
  get<K extends StructuredTag>(kind: K, id: string): StructuredRecordMap[K] | undefined {
    const records: ReadonlyMap<string, StructuredRecordMap[K]> = this.recordMaps[kind];
    return records.get(id);
  }

  /**
   * All records of one kind in insertion order
   */
  records<K extends StructuredTag>(kind: K): StructuredRecordMap[K][] {
    const records: ReadonlyMap<string, StructuredRecordMap[K]> = this.recordMaps[kind];
    return [...records.values()];
  }

  /**
   * Latest value of a generic key, e.g. `getSingular("fileformat")`
   */
  getSingular(key: string): GenericValue | undefined {
    return this.genericMetadata.get(key)?.at(-1);
  }

  /**
   * Version string from `##fileformat=VCFv4.x`
   */
  get fileFormat(): string | undefined {
    const value = this.getSingular("fileformat");
    return value?.kind === "scalar" ? value.value : undefined;
  }

  private put<R extends { readonly id: string }>(
    records: Map<string, R>,
    kind: StructuredTag,
    record: R,
    lineNumber?: number
  ): void {
    if (records.has(record.id)) {
      this.warn(`Duplicate ${kind} id '${record.id}', later declaration wins`, lineNumber);
    }
    records.set(record.id, record);
  }

  private putGeneric(key: string, value: GenericValue, lineNumber?: number): void {
    const existing = this.genericMetadata.get(key);

    if (existing === undefined) {
      this.genericMetadata.set(key, [value]);
      return;
    }

    if (!SINGULAR_METADATA.includes(key)) {
      existing.push(value);
      return;
    }

    if (this.options.singularMetadata === "reject") {
      throw new DuplicateMetadataError(key, lineNumber);
    }
    this.warn(`Metadata key '${key}' should occur once, later value wins`, lineNumber);
    existing.splice(0, existing.length, value);
  }

  private checkReserved(
    kind: "INFO" | "FORMAT",
    record: { readonly id: string; readonly type: ValueType },
    reservedType: ValueType | undefined,
    lineNumber?: number
  ): void {
    if (!this.options.warnOnReservedMismatch) return;
    if (reservedType === undefined || reservedType === record.type) return;

    this.warn(
      `Reserved ${kind} field '${record.id}' declared as ${record.type}, expected ${reservedType}`,
      lineNumber
    );
  }

  private warn(message: string, lineNumber?: number): void {
    this.options.onWarning?.(message, lineNumber);
  }
}
