/**
 * Central format module exports
 *
 * @example
 * ```typescript
 * import { VcfHeaderParser, VcfHeaderWriter } from '../formats';
 * ```
 */

export { AbstractParser, type ResolvedOptions } from "./abstract-parser";
export * from "./vcf";
