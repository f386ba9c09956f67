import type { MiniYamlDatabase } from "./database";
import type { Tree } from "./treeBuilder";
import type { ArenaNodeId } from "./arena";
import { spanContains, type FileId, type Position, type PositionRange } from "./span";
import { findProperty } from "./typeData";

export interface DefinitionTarget {
  fileId: FileId;
  start: Position;
  end: Position;
}

export interface DocumentSymbolInfo {
  name: string;
  /** Trimmed value text, empty when the node has no value */
  detail: string;
  /** Whole line, without its terminator */
  range: PositionRange;
  /** The key */
  selectionRange: PositionRange;
  children: DocumentSymbolInfo[];
}

function joinDocLines(lines: string[] | undefined): string | undefined {
  return lines !== undefined && lines.length > 0 ? lines.join("\n") : undefined;
}

/**
 * Hover text for the token under `position`.
 *
 * Trait names show the trait's documentation, and property keys nested
 * under a trait show that property's. Any other non-blank token shows its
 * own text.
 */
export function computeHoverAt(
  db: MiniYamlDatabase,
  fileId: FileId,
  position: Position,
): string | undefined {
  const index = db.positionToByteIndex(fileId, position);
  if (index === undefined) {
    return undefined;
  }
  const token = db.tokenSpanningByteIndex(fileId, index);
  const text = token?.text.trim();
  if (token === undefined || !text) {
    return undefined;
  }

  const traitDocs = joinDocLines(db.traitByName(text)?.DocLines);
  if (traitDocs !== undefined) {
    return traitDocs;
  }

  const ref = db.nodeSpanningByteIndex(fileId, index);
  const tree = db.fileTree(fileId);
  if (ref !== undefined && tree !== undefined && ref.node.keyTokens.includes(token)) {
    const parentKey = parentNodeOf(tree, ref.id)?.keyText();
    const trait = parentKey === undefined ? undefined : db.traitByName(parentKey);
    const key = ref.node.keyText();
    const property = trait && key !== undefined ? findProperty(trait, key) : undefined;
    const propertyDocs = joinDocLines(property?.DocLines);
    if (propertyDocs !== undefined) {
      return propertyDocs;
    }
  }

  return text;
}

function parentNodeOf(tree: Tree, id: ArenaNodeId) {
  const parent = tree.arena.parent(id);
  return parent === undefined || parent === tree.sentinel ? undefined : tree.arena.get(parent);
}

/**
 * Where the name under `position` is defined: the first top-level key
 * with the same text in any file. `^Name` looks up `^Name`, including
 * when the cursor is on the caret.
 */
export function computeDefinitionAt(
  db: MiniYamlDatabase,
  fileId: FileId,
  position: Position,
): DefinitionTarget | undefined {
  const index = db.positionToByteIndex(fileId, position);
  if (index === undefined) {
    return undefined;
  }
  const ref = db.nodeSpanningByteIndex(fileId, index);
  if (ref === undefined) {
    return undefined;
  }

  const tokens = ref.node.tokens();
  const tokenIndex = tokens.findIndex((token) => spanContains(token.span, index));
  if (tokenIndex === -1) {
    return undefined;
  }

  let searchFor: string;
  const token = tokens[tokenIndex];
  if (token.kind === "caret") {
    const next = tokens[tokenIndex + 1];
    if (next === undefined || next.kind !== "identifier") {
      return undefined;
    }
    searchFor = `^${next.text}`;
  } else {
    if (!token.text.trim()) {
      return undefined;
    }
    const previous = tokenIndex > 0 ? tokens[tokenIndex - 1] : undefined;
    searchFor = previous?.kind === "caret" ? `^${token.text}` : token.text;
  }

  const span = db.definitionSpan(searchFor);
  const range = span === undefined ? undefined : db.spanToRange(span);
  if (span === undefined || range === undefined) {
    return undefined;
  }
  return { fileId: span.fileId, start: range.start, end: range.end };
}

/** Keyed nodes of a file as a symbol outline */
export function computeSymbolsIn(
  db: MiniYamlDatabase,
  fileId: FileId,
): DocumentSymbolInfo[] | undefined {
  const tree = db.fileTree(fileId);
  if (tree === undefined) {
    return undefined;
  }

  const collect = (parent: ArenaNodeId): DocumentSymbolInfo[] => {
    const symbols: DocumentSymbolInfo[] = [];
    for (const id of tree.arena.children(parent)) {
      const node = tree.arena.get(id);
      if (node === undefined) continue;

      const children = collect(id);
      const name = node.keyText();
      const nodeSpan = node.span();
      const keySpan = node.keySpan();
      const range = nodeSpan === undefined ? undefined : db.spanToRange(nodeSpan);
      const selectionRange = keySpan === undefined ? undefined : db.spanToRange(keySpan);
      if (name === undefined || range === undefined || selectionRange === undefined) {
        // Unkeyed lines do not appear; anything nested under them moves up
        symbols.push(...children);
        continue;
      }

      symbols.push({
        name,
        detail: node.valueText()?.trim() ?? "",
        range,
        selectionRange,
        children,
      });
    }
    return symbols;
  };

  return collect(tree.sentinel);
}
