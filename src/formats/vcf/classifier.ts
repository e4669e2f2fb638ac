/**
 * Header line classification
 *
 * @module vcf/classifier
 */

import { HEADER_PREFIX, STRUCTURED_TAGS } from "./constants";
import type { LineKind, StructuredTag } from "./types";

/**
 * Whether a line belongs to the meta-information header
 */
export function isHeaderLine(line: string): boolean {
  return line.startsWith(HEADER_PREFIX);
}

/**
 * Narrow a tag name to one of the structured tags (case-sensitive)
 */
export function isStructuredTag(tag: string): tag is StructuredTag {
  return STRUCTURED_TAGS.some((known) => known === tag);
}

/**
 * Extract the tag of a header line: the text between `##` and the first `=`,
 * or the whole remainder when the line has no `=`
 */
export function headerTag(line: string): string {
  const body = line.startsWith(HEADER_PREFIX) ? line.slice(HEADER_PREFIX.length) : line;
  const assign = body.indexOf("=");
  return assign === -1 ? body : body.slice(0, assign);
}

/**
 * Route a header line to its parser. Purely lexical: `##INFO=...` is INFO,
 * `##info=...` is generic.
 *
 * @param line Raw line starting with `##`
 *
 * @example
 * ```typescript
 * classifyHeaderLine("##contig=<ID=chr1>"); // "contig"
 * classifyHeaderLine("##source=caller");    // "generic"
 * ```
 */
export function classifyHeaderLine(line: string): LineKind {
  const tag = headerTag(line);
  return isStructuredTag(tag) ? tag : "generic";
}
