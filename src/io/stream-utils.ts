/**
 * Stream processing utilities
 *
 * Turns a byte stream into complete text lines, buffering across chunk
 * boundaries and accepting \n, \r\n and \r line endings.
 */

import { BufferError, StreamError } from "../errors";
import type { LineProcessingResult } from "../types";

const MAX_LINE_LENGTH = 1_000_000;
const MAX_BUFFER_SIZE = 10_485_760; // 10MB

/**
 * Convert ReadableStream<Uint8Array> to async iterable of lines
 *
 * Line terminators are stripped. A final line without a terminator is
 * yielded unless it is blank.
 *
 * @param stream Stream of binary data to process
 * @param encoding Text encoding to use (default: 'utf8')
 * @param maxLineLength Longest line accepted before a {@link BufferError}
 * @throws {StreamError} If the underlying stream fails
 * @throws {BufferError} If a line is too long or the buffer overflows
 * @example
 * ```typescript
 * const stream = await createStream("calls.vcf");
 * for await (const line of readLines(stream)) {
 *   if (!line.startsWith("##")) break;
 * }
 * ```
 */
export async function* readLines(
  stream: ReadableStream<Uint8Array>,
  encoding: "utf8" | "ascii" | "binary" = "utf8",
  maxLineLength: number = MAX_LINE_LENGTH
): AsyncIterable<string> {
  const reader = stream.getReader();
  // TextDecoder has no 'ascii' label; latin1 keeps every byte for 'binary'
  const decoder = new TextDecoder(encoding === "binary" ? "iso-8859-1" : "utf-8");
  let buffer = "";
  let totalBytesProcessed = 0;

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;

      buffer += decoder.decode(value, { stream: true });
      totalBytesProcessed += value.length;

      const result = processBuffer(buffer, maxLineLength);
      buffer = result.remainder;
      yield* result.lines;

      if (buffer.length > MAX_BUFFER_SIZE) {
        throw new BufferError(
          `Buffer overflow: ${buffer.length} bytes exceeds maximum ${MAX_BUFFER_SIZE}`,
          buffer.length,
          "overflow"
        );
      }
    }

    buffer += decoder.decode();
    const result = processBuffer(buffer, maxLineLength);
    yield* result.lines;

    const last = result.remainder.endsWith("\r") ? result.remainder.slice(0, -1) : result.remainder;
    if (last.trim() !== "") {
      yield last;
    }
  } catch (error) {
    if (error instanceof BufferError) {
      throw error;
    }
    throw new StreamError(
      `Line reading failed: ${error instanceof Error ? error.message : String(error)}`,
      "read",
      totalBytesProcessed
    );
  } finally {
    reader.releaseLock();
  }
}

/**
 * Process text buffer to extract complete lines
 *
 * Handles \n, \r\n and \r endings. A trailing \r is held back in the
 * remainder, since the next chunk may start with \n.
 *
 * @param buffer Text buffer to process
 * @param maxLineLength Longest line accepted
 * @returns Complete lines and the remainder to carry forward
 * @throws {BufferError} If a single line exceeds the maximum length
 */
export function processBuffer(
  buffer: string,
  maxLineLength: number = MAX_LINE_LENGTH
): LineProcessingResult {
  const lines: string[] = [];
  let lineStart = 0;

  const pushLine = (end: number): void => {
    const line = buffer.slice(lineStart, end);
    if (line.length > maxLineLength) {
      throw new BufferError(
        `Line too long: ${line.length} characters exceeds maximum ${maxLineLength}`,
        line.length,
        "overflow",
        `Line starts with: ${line.slice(0, 100)}...`
      );
    }
    lines.push(line);
  };

  for (let position = 0; position < buffer.length; position++) {
    const char = buffer[position];

    if (char === "\n") {
      const end = position > lineStart && buffer[position - 1] === "\r" ? position - 1 : position;
      pushLine(end);
      lineStart = position + 1;
    } else if (char === "\r" && position + 1 < buffer.length && buffer[position + 1] !== "\n") {
      pushLine(position);
      lineStart = position + 1;
    }
  }

  const remainder = buffer.slice(lineStart);
  if (remainder.length > maxLineLength) {
    throw new BufferError(
      `Incomplete line too long: ${remainder.length} characters exceeds maximum ${maxLineLength}`,
      remainder.length,
      "overflow",
      "This might indicate a file without proper line endings"
    );
  }

  return { lines, remainder };
}

export const StreamUtils = {
  readLines,
  processBuffer,
} as const;
