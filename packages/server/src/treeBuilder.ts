/**
 * Rebuilds parent/child structure from the indentation of consecutive
 * lines.
 *
 * Building never fails: a line whose indentation cannot be reconciled
 * with the lines before it is reported and attached to the sentinel.
 *
 * Placement of the lines that carry no content:
 * - An empty line goes under the sentinel and leaves the open ancestors
 *   alone, so a blank line inside a block does not end it. Any other
 *   unindented line closes every open ancestor.
 * - Whitespace-only lines get no node.
 * - An indented comment-only line can still be the parent of the lines
 *   below it.
 */

import { Arena, type ArenaNodeId } from "./arena";
import { DiagnosticBag, bug, error, warning, type Diagnostic } from "./diagnostics";
import { Node } from "./lineGrouper";
import { getLogger } from "./logger";

const SPACES_PER_INDENT_LEVEL = 4;
const TABS_PER_INDENT_LEVEL = 1;

export type IndentLevelDelta =
  | { kind: "lessIndented"; amount: number }
  | { kind: "noChange" }
  | { kind: "moreIndented"; amount: number };

/** How `b` is indented relative to `a` */
export function indentDelta(a: Node, b: Node): IndentLevelDelta {
  const aLevel = a.indentationLevel();
  const bLevel = b.indentationLevel();
  if (bLevel === aLevel) return { kind: "noChange" };
  if (bLevel > aLevel) return { kind: "moreIndented", amount: bLevel - aLevel };
  return { kind: "lessIndented", amount: aLevel - bLevel };
}

export interface Tree {
  /** Parentless root; every top-level line is one of its children */
  sentinel: ArenaNodeId;
  /** Ids of every node, sentinel first, in source order */
  nodeIds: ArenaNodeId[];
  arena: Arena<Node>;
}

type IndentStyle = "spaces" | "tabs" | "mixed";

function indentStyle(indentation: string): IndentStyle {
  if (/^ +$/.test(indentation)) return "spaces";
  if (/^\t+$/.test(indentation)) return "tabs";
  return "mixed";
}

export class TreeBuilder {
  private readonly nodes: Iterable<Node>;
  private readonly diagnostics = new DiagnosticBag();

  private readonly arena = new Arena<Node>();
  private readonly sentinel: ArenaNodeId;
  private readonly nodeIds: ArenaNodeId[];
  /** Chain of nodes that may still receive children, innermost last */
  private parentStack: ArenaNodeId[] = [];

  constructor(nodes: Iterable<Node>) {
    this.nodes = nodes;
    this.sentinel = this.arena.newNode(Node.empty());
    this.nodeIds = [this.sentinel];
  }

  takeDiagnostics(): Diagnostic[] {
    return this.diagnostics.take();
  }

  run(): Tree {
    for (const node of this.nodes) {
      this.place(node);
    }
    return { sentinel: this.sentinel, nodeIds: this.nodeIds, arena: this.arena };
  }

  private place(node: Node): void {
    if (node.isWhitespaceOnly()) {
      const builder = warning("W0201", "Found a whitespace-only line").help(
        "Consider making the line empty",
      );
      const span = node.span();
      this.diagnostics.add(span ? builder.at(span) : builder);
      return;
    }

    if (node.indentation === undefined) {
      this.placeUnindented(node);
    } else {
      this.placeIndented(node, node.indentation.text);
    }
  }

  private placeUnindented(node: Node): void {
    const id = this.insert(node, this.sentinel);
    if (node.isEmpty()) {
      // Blank lines carry no structure and do not end a block
      return;
    }

    this.parentStack = [];
    if (!node.isCommentOnly()) {
      this.parentStack.push(id);
    }
  }

  private placeIndented(node: Node, indentation: string): void {
    const indentationSpan = node.indentation?.span;
    const style = indentStyle(indentation);

    if (style === "mixed") {
      const builder = error(
        "E0201",
        "Indentation must be made up entirely of spaces or entirely of tabs, not both",
      );
      this.diagnostics.add(indentationSpan ? builder.at(indentationSpan) : builder);
      this.insert(node, this.sentinel);
      return;
    }

    const level = node.indentationLevel();
    if (style === "spaces" && level % SPACES_PER_INDENT_LEVEL !== 0) {
      const builder = error(
        "E0202",
        `Indentation must be a multiple of ${SPACES_PER_INDENT_LEVEL} spaces`,
      ).help(`Indentation is currently ${level} spaces`);
      this.diagnostics.add(indentationSpan ? builder.at(indentationSpan) : builder);
    }

    const top = this.parentStack[this.parentStack.length - 1];
    const topNode = top === undefined ? undefined : this.arena.get(top);
    if (top === undefined || topNode === undefined) {
      this.reportNoParent(node, "E0206", "Unable to determine a parent for this indented line");
      const id = this.insert(node, this.sentinel);
      this.parentStack.push(id);
      return;
    }

    const delta = indentDelta(topNode, node);
    switch (delta.kind) {
      case "noChange": {
        this.parentStack.pop();
        const parent = this.parentStack[this.parentStack.length - 1] ?? this.sentinel;
        this.parentStack.push(this.insert(node, parent));
        return;
      }
      case "moreIndented": {
        this.checkStep(node, style, delta.amount);
        this.parentStack.push(this.insert(node, top));
        return;
      }
      case "lessIndented": {
        const step = style === "spaces" ? SPACES_PER_INDENT_LEVEL : TABS_PER_INDENT_LEVEL;
        const index = this.findAncestorIndex(level - step);
        if (index === undefined) {
          this.reportNoParent(
            node,
            "E0205",
            "Unable to determine a parent for this line due to its indentation",
          );
          const id = this.insert(node, this.sentinel);
          this.parentStack = [id];
          return;
        }
        this.parentStack.length = index + 1;
        this.parentStack.push(this.insert(node, this.parentStack[index]));
        return;
      }
    }
  }

  private checkStep(node: Node, style: IndentStyle, amount: number): void {
    const span = node.indentation?.span;
    if (style === "spaces" && amount !== SPACES_PER_INDENT_LEVEL) {
      const builder = error(
        "E0203",
        `Indentation must increase by ${SPACES_PER_INDENT_LEVEL} spaces`,
      ).help(`Consider deleting ${amount - SPACES_PER_INDENT_LEVEL} space(s)`);
      this.diagnostics.add(span ? builder.at(span) : builder);
    } else if (style === "tabs" && amount !== TABS_PER_INDENT_LEVEL) {
      const builder = error(
        "E0204",
        `Indentation must increase by ${TABS_PER_INDENT_LEVEL} tab`,
      );
      this.diagnostics.add(span ? builder.at(span) : builder);
    }
  }

  /** Position in the parent stack of the innermost node indented to `level` */
  private findAncestorIndex(level: number): number | undefined {
    for (let i = this.parentStack.length - 1; i >= 0; i--) {
      if (this.arena.get(this.parentStack[i])?.indentationLevel() === level) {
        return i;
      }
    }
    return undefined;
  }

  private reportNoParent(node: Node, code: string, message: string): void {
    const builder = error(code, message);
    const span = node.span();
    this.diagnostics.add(span ? builder.at(span) : builder);
  }

  private insert(node: Node, parent: ArenaNodeId): ArenaNodeId {
    const id = this.arena.newNode(node);
    this.nodeIds.push(id);

    const result = this.arena.append(parent, id);
    if (!result.ok) {
      const message = `Failed to make node ${id} a child of node ${parent}: ${result.reason}`;
      getLogger().error(message);
      const builder = bug("B0201", message);
      const span = node.span();
      this.diagnostics.add(span ? builder.at(span) : builder);
    }
    return id;
  }
}

/** Build the tree of a file's nodes, returning it with every diagnostic raised */
export function buildTree(nodes: Iterable<Node>): { tree: Tree; diagnostics: Diagnostic[] } {
  const builder = new TreeBuilder(nodes);
  const tree = builder.run();
  return { tree, diagnostics: builder.takeDiagnostics() };
}
