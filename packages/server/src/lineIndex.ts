import type { Position, SourceText } from "./span";

const LF = 0x0a;
const CR = 0x0d;

/**
 * Byte offset of the start of every line, followed by one synthetic entry
 * equal to the byte length of the text.
 *
 * A line starts at 0 and after every `\n` that is not the last byte, so a
 * trailing newline does not open a line of its own here; the synthetic
 * entry stands in for it.
 */
export function computeLineStartOffsets(source: SourceText): number[] {
  const offsets: number[] = [];
  const length = source.byteLength;

  if (length > 0) {
    offsets.push(0);
  }
  for (let i = 0; i < length; i++) {
    if (source.byteAt(i) === LF && i + 1 < length) {
      offsets.push(i + 1);
    }
  }
  offsets.push(length);
  return offsets;
}

function endsWithNewline(source: SourceText): boolean {
  return source.byteAt(source.byteLength - 1) === LF;
}

/** Whether the synthetic entry begins an (empty) line rather than ending the last one */
function syntheticIsLineStart(source: SourceText, offsets: number[]): boolean {
  return offsets.length === 1 || endsWithNewline(source);
}

/** End of a line's content, excluding its `\n` or `\r\n` */
function lineContentEnd(source: SourceText, offsets: number[], line: number): number {
  let end = offsets[line + 1];
  if (end > offsets[line] && source.byteAt(end - 1) === LF) {
    end--;
    if (end > offsets[line] && source.byteAt(end - 1) === CR) {
      end--;
    }
  }
  return end;
}

/**
 * Position of a byte index, or `undefined` when the index is past the end
 * of the text or inside a multi-byte character.
 */
export function byteIndexToPosition(
  source: SourceText,
  offsets: number[],
  index: number,
): Position | undefined {
  if (!source.isCharBoundary(index)) {
    return undefined;
  }

  let low = 0;
  let high = offsets.length - 1;
  let line = 0;
  while (low <= high) {
    const mid = (low + high) >> 1;
    if (offsets[mid] === index) {
      line = mid;
      low = mid;
      break;
    }
    if (offsets[mid] < index) {
      line = mid;
      low = mid + 1;
    } else {
      high = mid - 1;
    }
  }

  const synthetic = offsets.length - 1;
  if (line === synthetic && offsets[line] === index) {
    if (syntheticIsLineStart(source, offsets)) {
      return { line, character: 0 };
    }
    line = synthetic - 1;
  } else if (offsets[line] === index) {
    return { line, character: 0 };
  }

  return { line, character: source.countChars(offsets[line], index) };
}

/**
 * Byte index of a position, or `undefined` when the line does not exist or
 * the character lies past the end of the line's content.
 */
export function positionToByteIndex(
  source: SourceText,
  offsets: number[],
  position: Position,
): number | undefined {
  const { line, character } = position;
  if (line < 0 || character < 0 || !Number.isInteger(line) || !Number.isInteger(character)) {
    return undefined;
  }

  const synthetic = offsets.length - 1;
  if (line > synthetic) {
    return undefined;
  }
  if (line === synthetic) {
    if (!syntheticIsLineStart(source, offsets) || character !== 0) {
      return undefined;
    }
    return offsets[line];
  }

  const end = lineContentEnd(source, offsets, line);
  return source.advanceChars(offsets[line], character, end);
}

/** Number of addressable lines, counting an empty line after a trailing newline */
export function lineCount(source: SourceText, offsets: number[]): number {
  return syntheticIsLineStart(source, offsets) ? offsets.length : offsets.length - 1;
}
