import { describe, expect, it } from "vitest";
import type { ArenaNodeId } from "./arena";
import { groupLines } from "./lineGrouper";
import { tokenize } from "./tokenizer";
import { buildTree, indentDelta, type Tree } from "./treeBuilder";

function build(text: string) {
  const { nodes } = groupLines(tokenize(0, text).tokens);
  return buildTree(nodes);
}

/** Keys of a node's children, recursively, for readable assertions */
function outline(tree: Tree, id: ArenaNodeId = tree.sentinel): unknown[] {
  return [...tree.arena.children(id)].map((child) => {
    const node = tree.arena.get(child);
    const label = node?.keyText() ?? (node?.isEmpty() ? "<empty>" : node?.comment?.text ?? "?");
    const nested = outline(tree, child);
    return nested.length > 0 ? [label, nested] : label;
  });
}

function codes(text: string): string[] {
  return build(text).diagnostics.map((d) => d.code);
}

describe("buildTree", () => {
  it("nests a spaces-indented document without errors", () => {
    const { tree, diagnostics } = build(
      "A2:\n    B3:\n\nC5:\n    D6:\n        E7:\n    F8:\n        G9:\n    H10:\n\nI12:\n",
    );
    expect(tree.arena.size).toBe(12);
    expect(tree.nodeIds).toHaveLength(12);
    expect(diagnostics.filter((d) => d.severity === "error" || d.severity === "bug")).toEqual([]);
    expect(outline(tree)).toEqual([
      ["A2", ["B3"]],
      "<empty>",
      ["C5", [["D6", ["E7"]], ["F8", ["G9"]], "H10"]],
      "<empty>",
      "I12",
    ]);
  });

  it("keeps blank lines from ending a block", () => {
    const { tree } = build("A:\n    B:\n\n    C:\n");
    expect(outline(tree)).toEqual([["A", ["B", "C"]], "<empty>"]);
  });

  it("nests tab-indented lines", () => {
    const { tree, diagnostics } = build("A:\n\tB:\n\t\tC:\n\tD:\n");
    expect(diagnostics).toEqual([]);
    expect(outline(tree)).toEqual([["A", [["B", ["C"]], "D"]]]);
  });

  it("skips whitespace-only lines with a warning", () => {
    const { tree, diagnostics } = build("A:\n    \nB:\n");
    expect(tree.nodeIds).toHaveLength(3);
    expect(diagnostics.map((d) => [d.severity, d.code])).toEqual([["warning", "W0201"]]);
    expect(diagnostics[0].span).toEqual({ fileId: 0, start: 3, end: 7 });
  });

  it("reports indentation that mixes tabs and spaces", () => {
    const { tree, diagnostics } = build("A:\n \tB:\n    C:\n");
    expect(diagnostics.map((d) => d.code)).toEqual(["E0201"]);
    expect(diagnostics[0].span).toEqual({ fileId: 0, start: 3, end: 5 });
    expect(outline(tree)).toEqual([["A", ["C"]], "B"]);
  });

  it("reports spaces that are not a whole indent level", () => {
    expect(codes("A:\n  B:\n")).toEqual(["E0202", "E0203"]);
  });

  it("reports indentation that jumps more than one level", () => {
    const { tree, diagnostics } = build("A:\n        B:\n");
    expect(diagnostics.map((d) => d.code)).toEqual(["E0203"]);
    expect(diagnostics[0].children).toEqual([
      { severity: "help", message: "Consider deleting 4 space(s)" },
    ]);
    expect(outline(tree)).toEqual([["A", ["B"]]]);
    expect(codes("A:\n\t\tB:\n")).toEqual(["E0204"]);
  });

  it("attaches a dedent with no matching ancestor to the sentinel", () => {
    const { tree, diagnostics } = build("A:\n        B:\n            C:\n        D:\n");
    expect(diagnostics.map((d) => d.code)).toEqual(["E0203", "E0205"]);
    expect(diagnostics[1].span).toEqual({ fileId: 0, start: 29, end: 39 });
    expect(outline(tree)).toEqual([["A", [["B", ["C"]]]], "D"]);
  });

  it("reports an indented line with nothing to attach to", () => {
    const { tree, diagnostics } = build("# header\n    A:\n        B:\n");
    expect(diagnostics.map((d) => d.code)).toEqual(["E0206"]);
    expect(outline(tree)).toEqual(["# header", ["A", ["B"]]]);
  });

  it("puts every line into the tree exactly once", () => {
    const { tree } = build("A:\n\tB:\n  \tC:\n\t\t\tD:\n# c\n\nE:\n");
    const reachable = [...tree.arena.descendants(tree.sentinel)].sort((a, b) => a - b);
    expect(reachable).toEqual(tree.nodeIds);
    expect(tree.nodeIds).toHaveLength(8);
  });
});

describe("indentDelta", () => {
  it("compares indentation lengths", () => {
    const [a, b, c] = groupLines(tokenize(0, "A:\n    B:\n  C:\n").tokens).nodes;
    expect(indentDelta(a, b)).toEqual({ kind: "moreIndented", amount: 4 });
    expect(indentDelta(b, c)).toEqual({ kind: "lessIndented", amount: 2 });
    expect(indentDelta(c, c)).toEqual({ kind: "noChange" });
  });
});
