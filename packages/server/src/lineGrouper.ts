/**
 * Groups a token stream into one `Node` per source line.
 *
 * A node splits its line into indentation, key, the `:` that ends the
 * key, value and trailing comment. Every token lands in exactly one node,
 * the line terminator included.
 */

import { DiagnosticBag, error, warning, type Diagnostic } from "./diagnostics";
import { MultiPeek } from "./multiPeek";
import { mergeSpans, type ByteSpan } from "./span";
import type { Token, TokenKind } from "./tokenizer";

export interface NodeParts {
  indentation?: Token;
  keyTokens: Token[];
  keyTerminator?: Token;
  valueTokens: Token[];
  comment?: Token;
  endOfLine?: Token;
}

const NUMERIC_KINDS: ReadonlySet<TokenKind> = new Set(["intLiteral", "floatLiteral"]);

function spanOf(tokens: Token[]): ByteSpan | undefined {
  if (tokens.length === 0) {
    return undefined;
  }
  return mergeSpans(tokens[0].span, tokens[tokens.length - 1].span);
}

function withoutTrailingWhitespace(tokens: Token[]): Token[] {
  let end = tokens.length;
  while (end > 0 && tokens[end - 1].kind === "whitespace") {
    end--;
  }
  return tokens.slice(0, end);
}

/**
 * One logical line of MiniYaml.
 *
 * Invariant: `keyTerminator` is only ever set when `keyTokens` is non-empty.
 */
export class Node {
  readonly indentation?: Token;
  readonly keyTokens: readonly Token[];
  readonly keyTerminator?: Token;
  readonly valueTokens: readonly Token[];
  readonly comment?: Token;
  readonly endOfLine?: Token;

  constructor(parts: NodeParts) {
    this.indentation = parts.indentation;
    this.keyTokens = parts.keyTokens;
    this.keyTerminator = parts.keyTerminator;
    this.valueTokens = parts.valueTokens;
    this.comment = parts.comment;
    this.endOfLine = parts.endOfLine;
  }

  static empty(): Node {
    return new Node({ keyTokens: [], valueTokens: [] });
  }

  /** No indentation, key, value or comment (the terminator does not count) */
  isEmpty(): boolean {
    return (
      this.indentation === undefined &&
      this.keyTokens.length === 0 &&
      this.keyTerminator === undefined &&
      this.valueTokens.length === 0 &&
      this.comment === undefined
    );
  }

  isWhitespaceOnly(): boolean {
    return (
      this.indentation !== undefined &&
      this.keyTokens.length === 0 &&
      this.keyTerminator === undefined &&
      this.valueTokens.length === 0 &&
      this.comment === undefined
    );
  }

  isCommentOnly(): boolean {
    return (
      this.comment !== undefined &&
      this.keyTokens.length === 0 &&
      this.keyTerminator === undefined &&
      this.valueTokens.length === 0
    );
  }

  hasKey(): boolean {
    return this.keyTokens.length > 0;
  }

  isTopLevel(): boolean {
    return this.indentationLevel() === 0;
  }

  /** Length of the indentation in characters, 0 when unindented */
  indentationLevel(): number {
    return this.indentation === undefined ? 0 : Array.from(this.indentation.text).length;
  }

  /** Every token of the line in source order, terminator included */
  tokens(): Token[] {
    const tokens: Token[] = [];
    if (this.indentation) tokens.push(this.indentation);
    tokens.push(...this.keyTokens);
    if (this.keyTerminator) tokens.push(this.keyTerminator);
    tokens.push(...this.valueTokens);
    if (this.comment) tokens.push(this.comment);
    if (this.endOfLine) tokens.push(this.endOfLine);
    return tokens;
  }

  /** Span of the line's content, excluding the line terminator */
  span(): ByteSpan | undefined {
    const tokens = this.tokens();
    if (this.endOfLine) tokens.pop();
    return spanOf(tokens);
  }

  /** Span of the key, without whitespace between the key and its `:` */
  keySpan(): ByteSpan | undefined {
    return spanOf(withoutTrailingWhitespace([...this.keyTokens]));
  }

  valueSpan(): ByteSpan | undefined {
    return spanOf([...this.valueTokens]);
  }

  keyText(): string | undefined {
    const tokens = withoutTrailingWhitespace([...this.keyTokens]);
    return tokens.length === 0 ? undefined : tokens.map((token) => token.text).join("");
  }

  valueText(): string | undefined {
    return this.valueTokens.length === 0
      ? undefined
      : this.valueTokens.map((token) => token.text).join("");
  }
}

interface LineState {
  indentation?: Token;
  keyTokens: Token[];
  keyTerminator?: Token;
  valueTokens: Token[];
  comment?: Token;
  /** Set once a `:` was seen, whether or not it could terminate a key */
  inValue: boolean;
  sawToken: boolean;
}

function freshLine(): LineState {
  return { keyTokens: [], valueTokens: [], inValue: false, sawToken: false };
}

/**
 * Turns tokens into nodes, looking ahead where `@` and `^` need the next
 * token to be checked.
 */
export class LineGrouper implements IterableIterator<Node> {
  private readonly tokens: MultiPeek<Token>;
  private readonly diagnostics = new DiagnosticBag();

  constructor(tokens: Iterable<Token>) {
    this.tokens = new MultiPeek(tokens);
  }

  [Symbol.iterator](): IterableIterator<Node> {
    return this;
  }

  run(): Node[] {
    return Array.from(this);
  }

  takeDiagnostics(): Diagnostic[] {
    return this.diagnostics.take();
  }

  next(): IteratorResult<Node> {
    const line = freshLine();

    for (let result = this.tokens.next(); !result.done; result = this.tokens.next()) {
      const token = result.value;
      if (token.kind === "endOfLine") {
        return { done: false, value: this.finish(line, token) };
      }
      line.sawToken = true;
      this.place(line, token);
    }

    if (line.sawToken) {
      return { done: false, value: this.finish(line) };
    }
    return { done: true, value: undefined };
  }

  private place(line: LineState, token: Token): void {
    switch (token.kind) {
      case "comment":
        line.comment = token;
        return;
      case "whitespace":
        if (line.inValue) {
          line.valueTokens.push(token);
        } else if (line.keyTokens.length === 0 && line.indentation === undefined) {
          line.indentation = token;
        } else {
          line.keyTokens.push(token);
        }
        return;
      case "colon":
        this.placeColon(line, token);
        return;
      case "bang":
        if (!line.inValue) {
          this.diagnostics.add(
            error("E0104", "`!` is not valid in a key")
              .at(token.span)
              .help("Remove the `!` from the key")
              .note("`!` only has a meaning in values"),
          );
        }
        this.push(line, token);
        return;
      case "at":
        if (!line.inValue) {
          const next = this.tokens.peek();
          if (next !== undefined && next.kind !== "identifier" && !NUMERIC_KINDS.has(next.kind)) {
            this.diagnostics.add(
              error("E0103", "Expected an identifier or a number after `@`")
                .at(token.span)
                .label(next.span, "found this instead")
                .note("`@` separates a key from its suffix, as in `Name@Suffix`"),
            );
          }
          this.tokens.resetPeek();
        }
        this.push(line, token);
        return;
      case "caret":
        this.checkCaret(line, token);
        this.push(line, token);
        return;
      default:
        this.push(line, token);
    }
  }

  private placeColon(line: LineState, token: Token): void {
    if (line.inValue) {
      line.valueTokens.push(token);
      return;
    }

    line.inValue = true;
    if (line.keyTokens.some((t) => t.kind !== "whitespace")) {
      line.keyTerminator = token;
      return;
    }

    // A line without a key is only valid when it is empty or a comment
    this.diagnostics.add(
      error("E0101", "Expected a key before `:`")
        .at(token.span)
        .note("Only empty lines and comment-only lines may leave out the key"),
    );
    line.valueTokens.push(...line.keyTokens, token);
    line.keyTokens = [];
  }

  private checkCaret(line: LineState, token: Token): void {
    const next = this.tokens.peek();
    this.tokens.resetPeek();
    if (next === undefined || next.kind === "identifier") {
      return;
    }

    if (line.inValue) {
      // May be a parent reference that was not finished yet
      this.diagnostics.add(
        warning("W0101", "`^` in a value is not followed by an identifier")
          .at(token.span)
          .help("A parent reference is written `^ParentName`"),
      );
    } else {
      this.diagnostics.add(
        error("E0102", "Expected an identifier after `^`")
          .at(token.span)
          .label(next.span, "found this instead")
          .help("Inheritance is written `^ParentName`"),
      );
    }
  }

  private push(line: LineState, token: Token): void {
    if (line.inValue) {
      line.valueTokens.push(token);
    } else {
      line.keyTokens.push(token);
    }
  }

  private finish(line: LineState, endOfLine?: Token): Node {
    return new Node({
      indentation: line.indentation,
      keyTokens: line.keyTokens,
      keyTerminator: line.keyTerminator,
      valueTokens: line.valueTokens,
      comment: line.comment,
      endOfLine,
    });
  }
}

/** Group tokens into nodes, returning the nodes and every diagnostic raised */
export function groupLines(tokens: Iterable<Token>): { nodes: Node[]; diagnostics: Diagnostic[] } {
  const grouper = new LineGrouper(tokens);
  const nodes = grouper.run();
  return { nodes, diagnostics: grouper.takeDiagnostics() };
}
