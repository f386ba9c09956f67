/**
 * Byte spans, positions and a UTF-8 view over file text.
 *
 * Spans are byte offsets into the UTF-8 encoding of a file, the same
 * offsets the tokenizer produces. Positions count Unicode scalar values
 * from the start of a line, never bytes.
 */

import { BoundsError } from "./errors";

/** Opaque handle of a file tracked by the database */
export type FileId = number;

/** Half-open byte interval `[start, end)` in a particular file */
export interface ByteSpan {
  readonly fileId: FileId;
  readonly start: number;
  readonly end: number;
}

/** Zero-based line and character (Unicode scalar values) */
export interface Position {
  readonly line: number;
  readonly character: number;
}

export interface PositionRange {
  readonly start: Position;
  readonly end: Position;
}

export function createSpan(fileId: FileId, start: number, end: number): ByteSpan {
  if (start < 0 || end < start) {
    throw new BoundsError(`Invalid span ${start}..${end} in file ${fileId}`);
  }
  return { fileId, start, end };
}

export function spanLength(span: ByteSpan): number {
  return span.end - span.start;
}

/** Whether `index` lies in `[span.start, span.end)` */
export function spanContains(span: ByteSpan, index: number): boolean {
  return span.start <= index && index < span.end;
}

/** Span from the start of `first` to the end of `last` */
export function mergeSpans(first: ByteSpan, last: ByteSpan): ByteSpan {
  return createSpan(first.fileId, first.start, last.end);
}

/** Number of bytes `codePoint` occupies in UTF-8 (lone surrogates encode as U+FFFD) */
export function utf8Length(codePoint: number): number {
  if (codePoint < 0x80) return 1;
  if (codePoint < 0x800) return 2;
  if (codePoint < 0x10000) return 3;
  return 4;
}

function isContinuationByte(byte: number): boolean {
  return (byte & 0xc0) === 0x80;
}

/**
 * The UTF-8 bytes of a file's text, with boundary-checked slicing and
 * scalar-value counting.
 */
export class SourceText {
  readonly text: string;
  private readonly bytes: Buffer;

  constructor(text: string) {
    this.text = text;
    this.bytes = Buffer.from(text, "utf8");
  }

  get byteLength(): number {
    return this.bytes.length;
  }

  byteAt(index: number): number | undefined {
    return index >= 0 && index < this.bytes.length ? this.bytes[index] : undefined;
  }

  /** Whether `index` is the start of a character (or the end of the text) */
  isCharBoundary(index: number): boolean {
    if (!Number.isInteger(index) || index < 0 || index > this.bytes.length) {
      return false;
    }
    if (index === this.bytes.length) return true;
    return !isContinuationByte(this.bytes[index]);
  }

  /**
   * Text of `[start, end)`.
   *
   * @throws BoundsError when either end is out of range or splits a character
   */
  slice(start: number, end: number): string {
    this.assertRange(start, end);
    return this.bytes.toString("utf8", start, end);
  }

  sliceSpan(span: ByteSpan): string {
    return this.slice(span.start, span.end);
  }

  /** Number of Unicode scalar values in `[start, end)` */
  countChars(start: number, end: number): number {
    this.assertRange(start, end);
    let count = 0;
    for (let i = start; i < end; i++) {
      if (!isContinuationByte(this.bytes[i])) count++;
    }
    return count;
  }

  /**
   * Byte index reached by stepping over `count` characters from `start`
   * without passing `limit`, or `undefined` if `limit` comes first.
   */
  advanceChars(start: number, count: number, limit: number): number | undefined {
    let index = start;
    for (let stepped = 0; stepped < count; stepped++) {
      if (index >= limit) return undefined;
      index++;
      while (index < limit && isContinuationByte(this.bytes[index])) {
        index++;
      }
    }
    return index <= limit ? index : undefined;
  }

  private assertRange(start: number, end: number): void {
    if (start > end) {
      throw new BoundsError(`Range start ${start} is after its end ${end}`);
    }
    if (!this.isCharBoundary(start) || !this.isCharBoundary(end)) {
      throw new BoundsError(
        `Range ${start}..${end} is outside the text (${this.bytes.length} bytes) or splits a character`,
      );
    }
  }
}
