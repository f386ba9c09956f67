/**
 * Splits MiniYaml text into a flat stream of classified tokens.
 *
 * The token stream always covers the whole input: concatenating every
 * token's `text` gives back the original string, and each span starts
 * where the previous one ended.
 */

import { DiagnosticBag, bug, warning, type Diagnostic } from "./diagnostics";
import { getLogger } from "./logger";
import { createSpan, utf8Length, type ByteSpan, type FileId } from "./span";

export type TokenKind =
  | "error"
  | "whitespace"
  | "comment"
  | "true"
  | "yes"
  | "false"
  | "no"
  | "identifier"
  | "intLiteral"
  | "floatLiteral"
  | "symbol"
  | "tilde"
  | "bang"
  | "at"
  | "caret"
  | "colon"
  | "logicalOr"
  | "logicalAnd"
  | "endOfLine";

export interface Token {
  kind: TokenKind;
  span: ByteSpan;
  /** The exact source text the span covers */
  text: string;
}

const SYMBOL_CHARS = new Set(["~", "!", "@", ":", "|", "&", "#", "^"]);

const KEYWORDS = new Map<string, TokenKind>([
  ["true", "true"],
  ["false", "false"],
  ["yes", "yes"],
  ["no", "no"],
]);

const WHITESPACE = /^\p{White_Space}$/u;
const INT_LITERAL = /^-?\d+$/;
const FLOAT_LITERAL = /^-?(?:\d+(?:\.\d*)?|\.\d+)$/;

const I64_MIN = -(2n ** 63n);
const I64_MAX = 2n ** 63n - 1n;

function isSymbol(ch: string): boolean {
  return SYMBOL_CHARS.has(ch);
}

function isWhitespace(ch: string): boolean {
  return WHITESPACE.test(ch);
}

function isDigit(ch: string): boolean {
  return ch >= "0" && ch <= "9";
}

function isDigitOrNumericSymbol(ch: string): boolean {
  return ch === "-" || ch === "." || isDigit(ch);
}

function isDecimalStart(ch: string): boolean {
  return ch === "-" || isDigit(ch);
}

function isIdentifierStart(ch: string): boolean {
  return (ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z") || ch === "_";
}

function isIdentifierContinue(ch: string): boolean {
  return isIdentifierStart(ch) || isDigitOrNumericSymbol(ch);
}

function isLineBreak(ch: string): boolean {
  return ch === "\n" || ch === "\r";
}

function parsesAsInt(slice: string): boolean {
  if (!INT_LITERAL.test(slice)) return false;
  const value = BigInt(slice);
  return value >= I64_MIN && value <= I64_MAX;
}

function parsesAsFloat(slice: string): boolean {
  return FLOAT_LITERAL.test(slice);
}

/**
 * Lazy, single-pass tokenizer with one character of lookahead.
 *
 * ```ts
 * const tokens = new Tokenizer(fileId, "Name: value").run();
 * ```
 */
export class Tokenizer implements IterableIterator<Token> {
  private readonly fileId: FileId;
  private readonly text: string;
  private readonly diagnostics = new DiagnosticBag();

  /** UTF-16 index of the next character to consume */
  private cursor = 0;
  /** Byte offset of `cursor` */
  private byteCursor = 0;
  private tokenStart = 0;
  private tokenByteStart = 0;

  constructor(fileId: FileId, text: string) {
    this.fileId = fileId;
    this.text = text;
  }

  [Symbol.iterator](): IterableIterator<Token> {
    return this;
  }

  next(): IteratorResult<Token> {
    const kind = this.consumeToken();
    if (kind === undefined) {
      return { done: true, value: undefined };
    }
    return { done: false, value: this.emit(kind) };
  }

  run(): Token[] {
    return Array.from(this);
  }

  /** Diagnostics raised so far; the internal batch is cleared */
  takeDiagnostics(): Diagnostic[] {
    return this.diagnostics.take();
  }

  private consumeToken(): TokenKind | undefined {
    const ch = this.advance();
    if (ch === undefined) {
      return undefined;
    }

    switch (ch) {
      // Kept out of symbol runs so they never combine
      case "~":
        return "tilde";
      case "!":
        return "bang";
      case "@":
        return "at";
      case "^":
        return "caret";
      case ":":
        return "colon";
      case "\n":
        return "endOfLine";
      case "\r":
        if (this.peekIs("\n")) {
          this.advance();
          return "endOfLine";
        }
        this.diagnostics.add(
          warning("W0004", "Invalid newline sequence: `\\r` not followed by `\\n`").at(
            this.tokenSpan(),
          ),
        );
        return "error";
    }

    // Bullet-point text (`- item`) or property removal (`-Name`)
    if (ch === "-" && (this.peekSatisfies(isWhitespace) || this.peekSatisfies(isIdentifierStart))) {
      return "symbol";
    }
    if (isSymbol(ch)) {
      return this.consumeSymbol();
    }
    if (isWhitespace(ch)) {
      this.skipWhile((next) => !isLineBreak(next) && isWhitespace(next));
      return "whitespace";
    }
    if (isDecimalStart(ch) || isIdentifierStart(ch)) {
      return this.consumeIdentifierOrDecimalLiteral();
    }
    return "symbol";
  }

  private consumeSymbol(): TokenKind {
    this.skipWhile(isSymbol);

    const slice = this.tokenSlice();
    if (slice === "&&") return "logicalAnd";
    if (slice === "||") return "logicalOr";
    if (slice.startsWith("#")) {
      this.skipWhile((next) => !isLineBreak(next));
      return "comment";
    }
    if (slice.length === 0) {
      this.diagnostics.add(
        bug("B0001", "Symbol consumption started without a symbol character").at(
          this.tokenSpan(),
        ),
      );
      return "error";
    }
    return "symbol";
  }

  private consumeIdentifierOrDecimalLiteral(): TokenKind {
    this.skipWhile(isIdentifierContinue);

    const slice = this.tokenSlice();
    if (slice.length === 0) {
      this.diagnostics.add(
        bug("B0002", "Identifier consumption started without an identifier character").at(
          this.tokenSpan(),
        ),
      );
      return "error";
    }

    const keyword = KEYWORDS.get(slice.toLowerCase());
    if (keyword !== undefined) {
      return keyword;
    }

    const chars = Array.from(slice);
    if (chars.every((c) => c === "-")) {
      return "identifier";
    }

    if (chars.every(isDigitOrNumericSymbol) && isDigit(chars[chars.length - 1])) {
      if (slice.includes(".")) {
        if (parsesAsFloat(slice)) return "floatLiteral";
        getLogger().debug(`Failed to parse ${JSON.stringify(slice)} as a float, treating it as an identifier`);
      } else {
        if (parsesAsInt(slice)) return "intLiteral";
        getLogger().debug(
          `Failed to parse ${JSON.stringify(slice)} as a signed 64-bit integer, treating it as an identifier`,
        );
      }
    }

    return "identifier";
  }

  /** Consume one character, returning it */
  private advance(): string | undefined {
    const codePoint = this.text.codePointAt(this.cursor);
    if (codePoint === undefined) {
      return undefined;
    }
    const width = codePoint > 0xffff ? 2 : 1;
    const ch = this.text.slice(this.cursor, this.cursor + width);
    this.cursor += width;
    this.byteCursor += utf8Length(codePoint);
    return ch;
  }

  private peek(): string | undefined {
    const codePoint = this.text.codePointAt(this.cursor);
    if (codePoint === undefined) {
      return undefined;
    }
    return String.fromCodePoint(codePoint);
  }

  private peekIs(expected: string): boolean {
    return this.peek() === expected;
  }

  private peekSatisfies(predicate: (ch: string) => boolean): boolean {
    const ch = this.peek();
    return ch !== undefined && predicate(ch);
  }

  private skipWhile(keepGoing: (ch: string) => boolean): void {
    while (this.peekSatisfies(keepGoing)) {
      this.advance();
    }
  }

  private tokenSlice(): string {
    return this.text.slice(this.tokenStart, this.cursor);
  }

  private tokenSpan(): ByteSpan {
    return createSpan(this.fileId, this.tokenByteStart, this.byteCursor);
  }

  private emit(kind: TokenKind): Token {
    const token: Token = { kind, span: this.tokenSpan(), text: this.tokenSlice() };
    this.tokenStart = this.cursor;
    this.tokenByteStart = this.byteCursor;
    return token;
  }
}

/** Tokenize a whole text, returning the tokens and every diagnostic raised */
export function tokenize(
  fileId: FileId,
  text: string,
): { tokens: Token[]; diagnostics: Diagnostic[] } {
  const tokenizer = new Tokenizer(fileId, text);
  const tokens = tokenizer.run();
  return { tokens, diagnostics: tokenizer.takeDiagnostics() };
}
