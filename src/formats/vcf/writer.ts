/**
 * VCF header writer
 *
 * Renders parsed records back into `##` lines. Formatting a record and
 * parsing the result gives an equal record; for byte-exact output use
 * {@link HeaderMetadataStore.rawHeader} instead.
 *
 * @module vcf/writer
 */

import { HEADER_PREFIX } from "./constants";
import { formatFieldCount } from "./field-count";
import type { HeaderMetadataStore } from "./store";
import type {
  AltRecord,
  ContigRecord,
  FilterRecord,
  FormatRecord,
  GenericMetadata,
  HeaderEntry,
  InfoRecord,
} from "./types";

/**
 * VCF header writer
 *
 * @example
 * ```typescript
 * const writer = new VcfHeaderWriter();
 * writer.formatEntry({ kind: "FILTER", record: { id: "q10", description: "Quality below 10" } });
 * // ##FILTER=<ID=q10,Description="Quality below 10">
 * ```
 *
 * @public
 */
export class VcfHeaderWriter {
  /**
   * Format one header entry as a single line (no trailing newline)
   */
  formatEntry(entry: HeaderEntry): string {
    switch (entry.kind) {
      case "INFO":
        return this.formatInfo(entry.record);
      case "FILTER":
        return this.formatDescribed("FILTER", entry.record);
      case "ALT":
        return this.formatDescribed("ALT", entry.record);
      case "FORMAT":
        return this.formatFormat(entry.record);
      case "contig":
        return this.formatContig(entry.record);
      case "generic":
        return this.formatGeneric(entry.record);
    }
  }

  /**
   * Format a whole store: generic metadata first (in key order), then INFO,
   * FILTER, FORMAT, ALT and contig declarations
   *
   * @returns Header text with one line per entry, each ending in a newline
   */
  formatHeader(store: HeaderMetadataStore): string {
    const lines: string[] = [];

    for (const [key, values] of store.generic) {
      for (const value of values) {
        lines.push(this.formatGeneric({ key, value }));
      }
    }
    for (const record of store.info.values()) lines.push(this.formatInfo(record));
    for (const record of store.filters.values()) lines.push(this.formatDescribed("FILTER", record));
    for (const record of store.formats.values()) lines.push(this.formatFormat(record));
    for (const record of store.alts.values()) lines.push(this.formatDescribed("ALT", record));
    for (const record of store.contigs.values()) lines.push(this.formatContig(record));

    return lines.map((line) => `${line}\n`).join("");
  }

  /**
   * Write entries to a WritableStream, one line each
   */
  async writeToStream(
    entries: AsyncIterable<HeaderEntry>,
    stream: WritableStream<Uint8Array>
  ): Promise<void> {
    const writer = stream.getWriter();
    const encoder = new TextEncoder();

    try {
      for await (const entry of entries) {
        await writer.write(encoder.encode(`${this.formatEntry(entry)}\n`));
      }
    } finally {
      writer.releaseLock();
    }
  }

  private formatInfo(record: InfoRecord): string {
    const attributes = [
      `ID=${record.id}`,
      `Number=${formatFieldCount(record.number)}`,
      `Type=${record.type}`,
      `Description="${record.description}"`,
    ];
    if (record.source !== undefined) attributes.push(`Source="${record.source}"`);
    if (record.version !== undefined) attributes.push(`Version="${record.version}"`);
    return this.structured("INFO", attributes);
  }

  private formatFormat(record: FormatRecord): string {
    return this.structured("FORMAT", [
      `ID=${record.id}`,
      `Number=${formatFieldCount(record.number)}`,
      `Type=${record.type}`,
      `Description="${record.description}"`,
    ]);
  }

  private formatDescribed(tag: "FILTER" | "ALT", record: FilterRecord | AltRecord): string {
    return this.structured(tag, [`ID=${record.id}`, `Description="${record.description}"`]);
  }

  private formatContig(record: ContigRecord): string {
    const attributes = [`ID=${record.id}`];
    if (record.length !== undefined) attributes.push(`length=${record.length}`);
    return this.structured("contig", attributes);
  }

  private formatGeneric({ key, value }: GenericMetadata): string {
    switch (value.kind) {
      case "none":
        return `${HEADER_PREFIX}${key}`;
      case "scalar":
        return `${HEADER_PREFIX}${key}=${value.value}`;
      case "attributes": {
        const attributes = [...value.attributes].map(([name, raw]) => `${name}=${raw}`);
        return `${HEADER_PREFIX}${key}=<${attributes.join(",")}>`;
      }
    }
  }

  private structured(tag: string, attributes: string[]): string {
    return `${HEADER_PREFIX}${tag}=<${attributes.join(",")}>`;
  }
}
