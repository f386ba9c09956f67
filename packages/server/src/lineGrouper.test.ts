import { describe, expect, it } from "vitest";
import { groupLines, type Node } from "./lineGrouper";
import { tokenize } from "./tokenizer";

function group(text: string) {
  const { tokens } = tokenize(0, text);
  return { tokens, ...groupLines(tokens) };
}

function onlyNode(text: string): Node {
  const { nodes } = group(text);
  expect(nodes).toHaveLength(1);
  return nodes[0];
}

function texts(tokens: readonly { text: string }[]): string[] {
  return tokens.map((token) => token.text);
}

describe("groupLines", () => {
  it("splits a line into key, terminator, value and comment", () => {
    const node = onlyNode("Name: value # c\n");
    expect(node.indentation).toBeUndefined();
    expect(texts(node.keyTokens)).toEqual(["Name"]);
    expect(node.keyTerminator?.text).toBe(":");
    expect(texts(node.valueTokens)).toEqual([" ", "value", " "]);
    expect(node.comment?.text).toBe("# c");
    expect(node.endOfLine?.text).toBe("\n");
    expect(node.keyText()).toBe("Name");
    expect(node.valueText()).toBe(" value ");
    expect(node.span()).toEqual({ fileId: 0, start: 0, end: 15 });
  });

  it("takes leading whitespace as indentation and trims the key", () => {
    const node = onlyNode("    Key : x");
    expect(node.indentation?.text).toBe("    ");
    expect(node.indentationLevel()).toBe(4);
    expect(node.isTopLevel()).toBe(false);
    expect(texts(node.keyTokens)).toEqual(["Key", " "]);
    expect(node.keyText()).toBe("Key");
    expect(node.keySpan()).toEqual({ fileId: 0, start: 4, end: 7 });
    expect(node.valueSpan()).toEqual({ fileId: 0, start: 9, end: 11 });
  });

  it("keeps later colons in the value", () => {
    const node = onlyNode("Time: 12:30");
    expect(texts(node.valueTokens)).toEqual([" ", "12", ":", "30"]);
  });

  it("reports a colon without a key and moves on to the value", () => {
    const { nodes, diagnostics } = group("  : value");
    expect(nodes[0].indentation?.text).toBe("  ");
    expect(nodes[0].hasKey()).toBe(false);
    expect(nodes[0].keyTerminator).toBeUndefined();
    expect(texts(nodes[0].valueTokens)).toEqual([":", " ", "value"]);
    expect(diagnostics.map((d) => d.code)).toEqual(["E0101"]);
    expect(diagnostics[0].span).toEqual({ fileId: 0, start: 2, end: 3 });
    expect(diagnostics[0].children.map((c) => c.severity)).toEqual(["note"]);
  });

  it("keeps a bang in the key and reports it", () => {
    const { nodes, diagnostics } = group("Na!me: x");
    expect(nodes[0].keyText()).toBe("Na!me");
    expect(diagnostics.map((d) => d.code)).toEqual(["E0104"]);
    expect(diagnostics[0].span).toEqual({ fileId: 0, start: 2, end: 3 });
  });

  it("allows a bang in a value", () => {
    expect(group("Key: !x").diagnostics).toEqual([]);
  });

  it("requires an identifier or number after @ in a key", () => {
    expect(group("Key@Suffix: x").diagnostics).toEqual([]);
    expect(group("Key@1: x").diagnostics).toEqual([]);

    const { nodes, diagnostics } = group("Key@: x");
    expect(nodes[0].keyText()).toBe("Key@");
    expect(diagnostics.map((d) => d.code)).toEqual(["E0103"]);
    expect(diagnostics[0].span).toEqual({ fileId: 0, start: 3, end: 4 });
    expect(diagnostics[0].labels).toEqual([
      { span: { fileId: 0, start: 4, end: 5 }, message: "found this instead" },
    ]);
  });

  it("checks what follows a caret", () => {
    expect(group("^Parent:").diagnostics).toEqual([]);
    expect(group("Inherits: ^Parent").diagnostics).toEqual([]);
    expect(group("Key: ^").diagnostics).toEqual([]);

    const inKey = group("^: x").diagnostics;
    expect(inKey.map((d) => [d.severity, d.code])).toEqual([["error", "E0102"]]);
    expect(inKey[0].labels[0].span).toEqual({ fileId: 0, start: 1, end: 2 });

    const inValue = group("Key: ^ x").diagnostics;
    expect(inValue.map((d) => [d.severity, d.code])).toEqual([["warning", "W0101"]]);
  });

  it("does not let a caret check swallow the next token", () => {
    const node = onlyNode("^Parent: x");
    expect(texts(node.keyTokens)).toEqual(["^", "Parent"]);
    expect(node.keyText()).toBe("^Parent");
  });

  it("classifies empty, whitespace-only and comment-only lines", () => {
    const { nodes } = group("\n    \n  # hi\n");
    expect(nodes).toHaveLength(3);
    expect(nodes[0].isEmpty()).toBe(true);
    expect(nodes[1].isWhitespaceOnly()).toBe(true);
    expect(nodes[1].isEmpty()).toBe(false);
    expect(nodes[2].isCommentOnly()).toBe(true);
    expect(nodes[2].indentationLevel()).toBe(2);
  });

  it("emits an unterminated last line and nothing after a trailing newline", () => {
    expect(group("a\nb").nodes.map((n) => n.endOfLine?.text)).toEqual(["\n", undefined]);
    expect(group("a\n").nodes).toHaveLength(1);
    expect(group("").nodes).toEqual([]);
  });

  it("places every token in exactly one node", () => {
    const { tokens, nodes } = group("A: 1\n    -B@x: ^C # c\r\n\n\t: !\n^");
    expect(nodes.flatMap((node) => node.tokens())).toEqual(tokens);
  });
});
