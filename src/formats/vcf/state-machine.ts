/**
 * Attribute State Machine Module
 *
 * Splits the body of a bracketed header line (`ID=DP,Description="a,b"`) into
 * ordered key/value pairs. Commas inside double quotes never split; the quote
 * characters stay in the value.
 */

import { AttributeParseState } from "./types";

/**
 * Ordered (key, value) pair produced by the tokenizer
 */
export type AttributePair = readonly [key: string, value: string];

const QUOTE = '"';
const SEPARATOR = ",";
const ASSIGN = "=";

const CLOSING_DELIMITERS: Readonly<Record<string, string>> = {
  "<": ">",
  "[": "]",
};

/**
 * Tokenize an attribute body into ordered key/value pairs
 *
 * A quote only opens a quoted segment at the very start of a value, and
 * closing it does not end the pair: only a comma or the end of input does.
 * An unterminated quote swallows the rest of the body.
 *
 * @param body Attribute text with the outer `<>` or `[]` already removed
 * @returns Pairs in first-seen order, duplicates included
 *
 * @example
 * ```typescript
 * tokenizeAttributes('ID=DP,Description="a,b,c"');
 * // [["ID", "DP"], ["Description", '"a,b,c"']]
 * ```
 */
export function tokenizeAttributes(body: string): AttributePair[] {
  const pairs: AttributePair[] = [];
  let key = "";
  let value = "";
  let state = AttributeParseState.READING_KEY;

  for (const char of body) {
    switch (state) {
      case AttributeParseState.READING_KEY:
        if (char === ASSIGN) {
          value = "";
          state = AttributeParseState.READING_VALUE;
        } else {
          key += char;
        }
        break;

      case AttributeParseState.READING_VALUE:
        if (value === "" && char === QUOTE) {
          value += char;
          state = AttributeParseState.READING_QUOTED_VALUE;
        } else if (char === SEPARATOR) {
          pairs.push([key, value]);
          key = "";
          value = "";
          state = AttributeParseState.READING_KEY;
        } else {
          value += char;
        }
        break;

      case AttributeParseState.READING_QUOTED_VALUE:
        value += char;
        if (char === QUOTE) {
          state = AttributeParseState.READING_VALUE;
        }
        break;
    }
  }

  if (key !== "") {
    pairs.push([key, value]);
  }

  return pairs;
}

/**
 * Collect tokenizer output into an insertion-ordered map.
 * A repeated key keeps its first position and takes the last value.
 */
export function toAttributeMap(pairs: readonly AttributePair[]): Map<string, string> {
  const attributes = new Map<string, string>();
  for (const [key, value] of pairs) {
    attributes.set(key, value);
  }
  return attributes;
}

/**
 * Remove one outer `<...>` or `[...]` pair. A missing closer is tolerated.
 */
export function stripOuterDelimiters(value: string): string {
  const opener = value.charAt(0);
  const closer = CLOSING_DELIMITERS[opener];
  if (closer === undefined) return value;

  const end = value.endsWith(closer) ? value.length - 1 : value.length;
  return value.slice(1, Math.max(end, 1));
}

/**
 * Whether a value is wrapped in a pair of double quotes
 */
export function isQuoted(value: string): boolean {
  return value.length >= 2 && value.startsWith(QUOTE) && value.endsWith(QUOTE);
}

/**
 * Remove one pair of surrounding double quotes, if present
 */
export function unquote(value: string): string {
  return isQuoted(value) ? value.slice(1, -1) : value;
}
