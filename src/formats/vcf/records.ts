/**
 * Structured and generic header line parsers
 *
 * Each structured tag has a fixed field list. The attribute body is run
 * through the tokenizer and the fields are looked up by key, so attribute
 * order does not matter. A line that misses a required field produces no
 * record at all.
 *
 * @module vcf/records
 */

import { FieldCountInvalidError, StructuredLineMalformedError } from "../../errors";
import { classifyHeaderLine } from "./classifier";
import { HEADER_PREFIX, isValueType } from "./constants";
import { parseFieldCount } from "./field-count";
import {
  isQuoted,
  stripOuterDelimiters,
  toAttributeMap,
  tokenizeAttributes,
  unquote,
} from "./state-machine";
import type {
  AltRecord,
  ContigRecord,
  FieldCount,
  FilterRecord,
  FormatRecord,
  GenericMetadata,
  GenericValue,
  HeaderEntry,
  InfoRecord,
  StructuredTag,
  ValueType,
} from "./types";

/**
 * Sentinel value for a generic line without `=`
 *
 * @public
 */
export const NO_VALUE: GenericValue = Object.freeze<GenericValue>({ kind: "none" });

/**
 * Attribute map that refuses writes once constructed
 */
class FrozenAttributeMap extends Map<string, string> {
  constructor(entries: Iterable<readonly [string, string]>) {
    super(entries);
    Object.freeze(this);
  }

  override set(key: string, value: string): this {
    // Map's constructor fills the map through set()
    if (Object.isFrozen(this)) {
      throw new TypeError(`Cannot set '${key}' on frozen header attributes`);
    }
    return super.set(key, value);
  }

  override delete(key: string): boolean {
    throw new TypeError(`Cannot delete '${key}' from frozen header attributes`);
  }

  override clear(): void {
    throw new TypeError("Cannot clear frozen header attributes");
  }
}

/**
 * Attributes of one structured line, with the context needed for errors
 */
class StructuredFields {
  private constructor(
    private readonly tag: StructuredTag,
    private readonly line: string,
    private readonly attributes: ReadonlyMap<string, string>,
    private readonly lineNumber?: number
  ) {}

  /**
   * Check the `##TAG=<...>` shape and tokenize the body
   */
  static read(tag: StructuredTag, line: string, lineNumber?: number): StructuredFields {
    const prefix = `${HEADER_PREFIX}${tag}=`;
    if (!line.startsWith(prefix)) {
      throw new StructuredLineMalformedError(tag, line, `expected '${prefix}<...>'`, lineNumber);
    }

    const value = line.slice(prefix.length).trimEnd();
    if (!value.startsWith("<") || !value.endsWith(">")) {
      throw new StructuredLineMalformedError(
        tag,
        line,
        "attributes must be enclosed in '<' and '>'",
        lineNumber
      );
    }

    const attributes = new Map<string, string>();
    for (const [key, attributeValue] of tokenizeAttributes(value.slice(1, -1))) {
      attributes.set(key.trim(), attributeValue);
    }
    return new StructuredFields(tag, line, attributes, lineNumber);
  }

  malformed(reason: string): StructuredLineMalformedError {
    return new StructuredLineMalformedError(this.tag, this.line, reason, this.lineNumber);
  }

  optional(key: string): string | undefined {
    return this.attributes.get(key);
  }

  required(key: string): string {
    const value = this.attributes.get(key);
    if (value === undefined) {
      throw this.malformed(`missing required field '${key}'`);
    }
    return value;
  }

  id(): string {
    const id = this.required("ID");
    if (id === "") {
      throw this.malformed("ID must not be empty");
    }
    return id;
  }

  quoted(key: string): string {
    return this.unquoteStrict(key, this.required(key));
  }

  optionalQuoted(key: string): string | undefined {
    const value = this.optional(key);
    return value === undefined ? undefined : this.unquoteStrict(key, value);
  }

  number(): FieldCount {
    return this.fieldCount(this.required("Number"));
  }

  type(): ValueType {
    const value = this.required("Type");
    if (!isValueType(value)) {
      throw this.malformed(`unknown Type '${value}'`);
    }
    return value;
  }

  /**
   * Contig length; `.` reads as absent, like a missing attribute
   */
  length(): number | undefined {
    const value = this.optional("length");
    if (value === undefined) return undefined;

    const length = this.fieldCount(value);
    switch (length.kind) {
      case "fixed":
        return length.count;
      case "unknown":
        return undefined;
      default:
        throw new FieldCountInvalidError(value, this.lineNumber, this.line);
    }
  }

  private fieldCount(token: string): FieldCount {
    try {
      return parseFieldCount(token);
    } catch (error) {
      if (error instanceof FieldCountInvalidError) {
        throw new FieldCountInvalidError(error.token, this.lineNumber, this.line);
      }
      throw error;
    }
  }

  private unquoteStrict(key: string, value: string): string {
    if (!isQuoted(value)) {
      throw this.malformed(`${key} must be a quoted string`);
    }
    return unquote(value);
  }
}

/**
 * Parse `##INFO=<ID=..,Number=..,Type=..,Description="..">`, with optional
 * quoted Source and quoted or bare Version
 *
 * @throws {StructuredLineMalformedError} If a required field is missing or malformed
 * @throws {FieldCountInvalidError} If Number is not a valid token
 *
 * @public
 */
export function parseInfoLine(line: string, lineNumber?: number): InfoRecord {
  const fields = StructuredFields.read("INFO", line, lineNumber);
  const id = fields.id();
  const number = fields.number();
  const type = fields.type();
  const description = fields.quoted("Description");
  const source = fields.optionalQuoted("Source");
  const version = fields.optional("Version");

  return Object.freeze({
    id,
    number,
    type,
    description,
    ...(source !== undefined && { source }),
    ...(version !== undefined && { version: unquote(version) }),
  });
}

/**
 * Parse `##FILTER=<ID=..,Description="..">`
 *
 * @public
 */
export function parseFilterLine(line: string, lineNumber?: number): FilterRecord {
  const fields = StructuredFields.read("FILTER", line, lineNumber);
  return Object.freeze({ id: fields.id(), description: fields.quoted("Description") });
}

/**
 * Parse `##ALT=<ID=..,Description="..">`
 *
 * @public
 */
export function parseAltLine(line: string, lineNumber?: number): AltRecord {
  const fields = StructuredFields.read("ALT", line, lineNumber);
  return Object.freeze({ id: fields.id(), description: fields.quoted("Description") });
}

/**
 * Parse `##FORMAT=<ID=..,Number=..,Type=..,Description="..">`
 *
 * @public
 */
export function parseFormatLine(line: string, lineNumber?: number): FormatRecord {
  const fields = StructuredFields.read("FORMAT", line, lineNumber);
  return Object.freeze({
    id: fields.id(),
    number: fields.number(),
    type: fields.type(),
    description: fields.quoted("Description"),
  });
}

/**
 * Parse `##contig=<ID=..[,length=..]>`. Attributes other than ID and length
 * (assembly, md5, species...) are dropped, and `length=.` leaves the length
 * unset.
 *
 * @throws {FieldCountInvalidError} If length is neither an integer nor `.`
 *
 * @public
 */
export function parseContigLine(line: string, lineNumber?: number): ContigRecord {
  const fields = StructuredFields.read("contig", line, lineNumber);
  const id = fields.id();
  const length = fields.length();
  return Object.freeze({ id, ...(length !== undefined && { length }) });
}

/**
 * Parse any other header line
 *
 * - `##key=<A=1,B="x">` or `##key=[...]` gives an ordered attribute map
 * - `##key=value` splits on the first `=`
 * - `##key` gives {@link NO_VALUE}
 *
 * Never throws: non-conformant vendor lines are kept as they are.
 *
 * @public
 */
export function parseGenericLine(line: string): GenericMetadata {
  const body = line.startsWith(HEADER_PREFIX) ? line.slice(HEADER_PREFIX.length) : line;
  const assign = body.indexOf("=");

  if (assign === -1) {
    return Object.freeze({ key: body, value: NO_VALUE });
  }

  const key = body.slice(0, assign);
  const raw = body.slice(assign + 1);

  if (raw.startsWith("<") || raw.startsWith("[")) {
    const attributes = new FrozenAttributeMap(
      toAttributeMap(tokenizeAttributes(stripOuterDelimiters(raw)))
    );
    const value = Object.freeze<GenericValue>({ kind: "attributes", attributes });
    return Object.freeze({ key, value });
  }

  const value = Object.freeze<GenericValue>({ kind: "scalar", value: raw });
  return Object.freeze({ key, value });
}

/**
 * Classify a header line and parse it with the matching grammar
 *
 * @param line Raw line starting with `##`
 * @param lineNumber Attached to errors and, unless `attachLineNumber` is
 *   false, to the returned entry
 *
 * @example
 * ```typescript
 * const entry = parseHeaderLine('##FILTER=<ID=q10,Description="Quality below 10">');
 * if (entry.kind === "FILTER") console.log(entry.record.description);
 * ```
 *
 * @public
 */
export function parseHeaderLine(
  line: string,
  lineNumber?: number,
  attachLineNumber = true
): HeaderEntry {
  const position = lineNumber !== undefined && attachLineNumber ? { lineNumber } : {};

  switch (classifyHeaderLine(line)) {
    case "INFO":
      return { kind: "INFO", record: parseInfoLine(line, lineNumber), ...position };
    case "FILTER":
      return { kind: "FILTER", record: parseFilterLine(line, lineNumber), ...position };
    case "ALT":
      return { kind: "ALT", record: parseAltLine(line, lineNumber), ...position };
    case "FORMAT":
      return { kind: "FORMAT", record: parseFormatLine(line, lineNumber), ...position };
    case "contig":
      return { kind: "contig", record: parseContigLine(line, lineNumber), ...position };
    case "generic":
      return { kind: "generic", record: parseGenericLine(line), ...position };
  }
}
