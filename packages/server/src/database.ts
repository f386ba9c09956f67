/**
 * The MiniYaml query database: file inputs plus every derived artifact of
 * the parse pipeline, each memoized per key.
 *
 * Editing one file's text only invalidates queries that read that file;
 * other files keep their tokens, nodes and trees.
 */

import type { ArenaNodeId } from "./arena";
import type { Diagnostic } from "./diagnostics";
import { BoundsError, ReadOnlySnapshotError, UnknownFileError } from "./errors";
import {
  computeDefinitionAt,
  computeHoverAt,
  computeSymbolsIn,
  type DefinitionTarget,
  type DocumentSymbolInfo,
} from "./languageQueries";
import { groupLines, type Node } from "./lineGrouper";
import {
  byteIndexToPosition,
  computeLineStartOffsets,
  positionToByteIndex,
} from "./lineIndex";
import { DerivedQuery, InputQuery, QueryRuntime, arraysEqual } from "./queryEngine";
import {
  SourceText,
  spanContains,
  type ByteSpan,
  type FileId,
  type Position,
  type PositionRange,
} from "./span";
import { tokenize, type Token } from "./tokenizer";
import { buildTree, type Tree } from "./treeBuilder";
import { findTrait, type TraitDetail, type TypeData } from "./typeData";

/** A node of a file's tree together with its arena id */
export interface TreeNodeRef {
  id: ArenaNodeId;
  node: Node;
}

export interface FileTopLevelNode extends TreeNodeRef {
  fileId: FileId;
}

/** Replace a byte range of the current text */
export interface SpanEdit {
  span: { start: number; end: number };
  text: string;
}

/** Replace a position range of the current text */
export interface RangeEdit {
  range: PositionRange;
  text: string;
}

export type TextEdit = SpanEdit | RangeEdit;

interface Lexed {
  tokens: Token[];
  diagnostics: Diagnostic[];
}

interface Grouped {
  nodes: Node[];
  diagnostics: Diagnostic[];
}

interface Built {
  tree: Tree;
  diagnostics: Diagnostic[];
}

interface FileIndexKey {
  fileId: FileId;
  index: number;
}

interface FilePositionKey {
  fileId: FileId;
  position: Position;
}

type Db = MiniYamlDatabase;

const singleton = () => "*";
const byFile = (fileId: FileId) => String(fileId);
const byFileIndex = ({ fileId, index }: FileIndexKey) => `${fileId}:${index}`;
const byFilePosition = ({ fileId, position }: FilePositionKey) =>
  `${fileId}:${position.line}:${position.character}`;
const byFileKey = ({ fileId, key }: { fileId: FileId; key: string }) =>
  `${fileId}:${JSON.stringify(key)}`;
const byText = (text: string) => JSON.stringify(text);

// Inputs

const fileTextInput = new InputQuery<FileId, string>("fileText", { keyId: byFile });
const fileNameInput = new InputQuery<FileId, string>("fileName", { keyId: byFile });
const allFileIdsInput = new InputQuery<null, FileId[]>("allFileIds", {
  keyId: singleton,
  equals: arraysEqual,
});
const typeDataInput = new InputQuery<null, TypeData>("typeData", { keyId: singleton });

// Pipeline

const sourceTextQuery = new DerivedQuery<Db, FileId, SourceText | undefined>(
  "sourceText",
  (db, fileId) => {
    const text = db.fileText(fileId);
    return text === undefined ? undefined : new SourceText(text);
  },
  { keyId: byFile },
);

const lexedFileQuery = new DerivedQuery<Db, FileId, Lexed | undefined>(
  "lexedFile",
  (db, fileId) => {
    const text = db.fileText(fileId);
    return text === undefined ? undefined : tokenize(fileId, text);
  },
  { keyId: byFile },
);

const fileTokensQuery = new DerivedQuery<Db, FileId, Token[] | undefined>(
  "fileTokens",
  (db, fileId) => lexedFileQuery.get(db.runtime, fileId)?.tokens,
  { keyId: byFile },
);

const groupedFileQuery = new DerivedQuery<Db, FileId, Grouped | undefined>(
  "groupedFile",
  (db, fileId) => {
    const tokens = db.fileTokens(fileId);
    return tokens === undefined ? undefined : groupLines(tokens);
  },
  { keyId: byFile },
);

const fileNodesQuery = new DerivedQuery<Db, FileId, Node[] | undefined>(
  "fileNodes",
  (db, fileId) => groupedFileQuery.get(db.runtime, fileId)?.nodes,
  { keyId: byFile },
);

const builtTreeQuery = new DerivedQuery<Db, FileId, Built | undefined>(
  "builtTree",
  (db, fileId) => {
    const nodes = db.fileNodes(fileId);
    return nodes === undefined ? undefined : buildTree(nodes);
  },
  { keyId: byFile },
);

const fileTreeQuery = new DerivedQuery<Db, FileId, Tree | undefined>(
  "fileTree",
  (db, fileId) => builtTreeQuery.get(db.runtime, fileId)?.tree,
  { keyId: byFile },
);

const fileDiagnosticsQuery = new DerivedQuery<Db, FileId, Diagnostic[] | undefined>(
  "fileDiagnostics",
  (db, fileId) => {
    const lexed = lexedFileQuery.get(db.runtime, fileId);
    const grouped = groupedFileQuery.get(db.runtime, fileId);
    const built = builtTreeQuery.get(db.runtime, fileId);
    if (lexed === undefined || grouped === undefined || built === undefined) {
      return undefined;
    }
    return [...lexed.diagnostics, ...grouped.diagnostics, ...built.diagnostics];
  },
  { keyId: byFile },
);

// Positions

const lineStartOffsetsQuery = new DerivedQuery<Db, FileId, number[] | undefined>(
  "lineStartOffsets",
  (db, fileId) => {
    const source = db.sourceText(fileId);
    return source === undefined ? undefined : computeLineStartOffsets(source);
  },
  { keyId: byFile, equals: arraysEqual },
);

const positionToByteIndexQuery = new DerivedQuery<Db, FilePositionKey, number | undefined>(
  "positionToByteIndex",
  (db, { fileId, position }) => {
    const source = db.sourceText(fileId);
    const offsets = db.lineStartOffsets(fileId);
    if (source === undefined || offsets === undefined) {
      return undefined;
    }
    return positionToByteIndex(source, offsets, position);
  },
  { keyId: byFilePosition },
);

const byteIndexToPositionQuery = new DerivedQuery<Db, FileIndexKey, Position | undefined>(
  "byteIndexToPosition",
  (db, { fileId, index }) => {
    const source = db.sourceText(fileId);
    const offsets = db.lineStartOffsets(fileId);
    if (source === undefined || offsets === undefined) {
      return undefined;
    }
    return byteIndexToPosition(source, offsets, index);
  },
  {
    keyId: byFileIndex,
    equals: (a, b) =>
      a === b ||
      (a !== undefined && b !== undefined && a.line === b.line && a.character === b.character),
  },
);

// Lookups

const tokenSpanningByteIndexQuery = new DerivedQuery<Db, FileIndexKey, Token | undefined>(
  "tokenSpanningByteIndex",
  (db, { fileId, index }) => {
    const tokens = db.fileTokens(fileId);
    if (tokens === undefined) {
      return undefined;
    }
    let low = 0;
    let high = tokens.length - 1;
    while (low <= high) {
      const mid = (low + high) >> 1;
      const span = tokens[mid].span;
      if (spanContains(span, index)) {
        return tokens[mid];
      }
      if (index < span.start) {
        high = mid - 1;
      } else {
        low = mid + 1;
      }
    }
    return undefined;
  },
  { keyId: byFileIndex },
);

const nodeSpanningByteIndexQuery = new DerivedQuery<Db, FileIndexKey, TreeNodeRef | undefined>(
  "nodeSpanningByteIndex",
  (db, { fileId, index }) => {
    const tree = db.fileTree(fileId);
    if (tree === undefined) {
      return undefined;
    }
    for (const id of tree.nodeIds) {
      if (id === tree.sentinel) continue;
      const node = tree.arena.get(id);
      const span = node?.span();
      if (node !== undefined && span !== undefined && spanContains(span, index)) {
        return { id, node };
      }
    }
    return undefined;
  },
  { keyId: byFileIndex },
);

const topLevelNodesQuery = new DerivedQuery<Db, FileId, TreeNodeRef[] | undefined>(
  "topLevelNodes",
  (db, fileId) => {
    const tree = db.fileTree(fileId);
    if (tree === undefined) {
      return undefined;
    }
    const refs: TreeNodeRef[] = [];
    for (const id of tree.arena.children(tree.sentinel)) {
      const node = tree.arena.get(id);
      if (node !== undefined && node.isTopLevel() && node.hasKey()) {
        refs.push({ id, node });
      }
    }
    return refs;
  },
  { keyId: byFile },
);

const topLevelNodeByKeyQuery = new DerivedQuery<
  Db,
  { fileId: FileId; key: string },
  TreeNodeRef | undefined
>(
  "topLevelNodeByKey",
  (db, { fileId, key }) => db.topLevelNodes(fileId)?.find((ref) => ref.node.keyText() === key),
  { keyId: byFileKey },
);

const topLevelNodesInAllFilesQuery = new DerivedQuery<Db, null, FileTopLevelNode[]>(
  "topLevelNodesInAllFiles",
  (db) =>
    db.allFileIds().flatMap((fileId) =>
      (db.topLevelNodes(fileId) ?? []).map((ref) => ({ fileId, ...ref })),
    ),
  { keyId: singleton },
);

const definitionSpanQuery = new DerivedQuery<Db, string, ByteSpan | undefined>(
  "definitionSpan",
  (db, key) => {
    for (const fileId of db.allFileIds()) {
      const span = db.topLevelNodeByKey(fileId, key)?.node.keySpan();
      if (span !== undefined) {
        return span;
      }
    }
    return undefined;
  },
  { keyId: byText },
);

const fileIdOfNameQuery = new DerivedQuery<Db, string, FileId | undefined>(
  "fileIdOfName",
  (db, name) => db.allFileIds().find((fileId) => db.fileName(fileId) === name),
  { keyId: byText },
);

const traitByNameQuery = new DerivedQuery<Db, string, TraitDetail | undefined>(
  "traitByName",
  (db, name) => {
    const typeData = db.typeData();
    return typeData === undefined ? undefined : findTrait(typeData, name);
  },
  { keyId: byText },
);

// Language features

const hoverAtQuery = new DerivedQuery<Db, FilePositionKey, string | undefined>(
  "hoverAt",
  (db, { fileId, position }) => computeHoverAt(db, fileId, position),
  { keyId: byFilePosition },
);

const definitionAtQuery = new DerivedQuery<Db, FilePositionKey, DefinitionTarget | undefined>(
  "definitionAt",
  (db, { fileId, position }) => computeDefinitionAt(db, fileId, position),
  { keyId: byFilePosition },
);

const symbolsInQuery = new DerivedQuery<Db, FileId, DocumentSymbolInfo[] | undefined>(
  "symbolsIn",
  (db, fileId) => computeSymbolsIn(db, fileId),
  { keyId: byFile },
);

// Memos keyed by a file, dropped when the file is removed

interface Evictable<K> {
  evict(runtime: QueryRuntime<Db>, matches: (key: K) => boolean): number;
}

const perFileQueries: Evictable<FileId>[] = [
  sourceTextQuery,
  lexedFileQuery,
  fileTokensQuery,
  groupedFileQuery,
  fileNodesQuery,
  builtTreeQuery,
  fileTreeQuery,
  fileDiagnosticsQuery,
  lineStartOffsetsQuery,
  topLevelNodesQuery,
  symbolsInQuery,
];

const perLocationQueries: Evictable<{ fileId: FileId }>[] = [
  byteIndexToPositionQuery,
  positionToByteIndexQuery,
  tokenSpanningByteIndexQuery,
  nodeSpanningByteIndexQuery,
  topLevelNodeByKeyQuery,
  hoverAtQuery,
  definitionAtQuery,
];

function evictFile(runtime: QueryRuntime<Db>, fileId: FileId): void {
  for (const query of perFileQueries) {
    query.evict(runtime, (key) => key === fileId);
  }
  for (const query of perLocationQueries) {
    query.evict(runtime, (key) => key.fileId === fileId);
  }
}

/**
 * Inputs are written through the ingest methods; every other method is a
 * memoized query. A database made by `snapshot()` answers queries as of
 * the moment it was taken and refuses writes.
 */
export class MiniYamlDatabase {
  readonly runtime: QueryRuntime<MiniYamlDatabase>;
  private nextFileId: FileId;

  constructor(runtime?: QueryRuntime<MiniYamlDatabase>, nextFileId: FileId = 0) {
    this.runtime = runtime ?? new QueryRuntime<MiniYamlDatabase>();
    this.runtime.attach(this);
    this.nextFileId = nextFileId;
  }

  get isSnapshot(): boolean {
    return this.runtime.readOnly;
  }

  /** A read-only database frozen at the current revision */
  snapshot(): MiniYamlDatabase {
    return new MiniYamlDatabase(this.runtime.fork(), this.nextFileId);
  }

  // Ingest

  /** Start tracking a file. Ids are never reused, not even after removal. */
  addFile(name: string, text: string): FileId {
    if (this.runtime.readOnly) {
      throw new ReadOnlySnapshotError("addFile");
    }
    const fileId = this.nextFileId++;
    fileNameInput.set(this.runtime, fileId, name);
    fileTextInput.set(this.runtime, fileId, text);
    allFileIdsInput.set(this.runtime, null, [...this.allFileIds(), fileId]);
    return fileId;
  }

  setFileText(fileId: FileId, text: string): void {
    this.assertLive(fileId);
    fileTextInput.set(this.runtime, fileId, text);
  }

  setFileName(fileId: FileId, name: string): void {
    this.assertLive(fileId);
    fileNameInput.set(this.runtime, fileId, name);
  }

  /**
   * Apply edits in order, each against the text the previous one produced.
   * The file's text is replaced once, so no reader sees a partial result.
   *
   * @throws BoundsError if any edit's range is invalid; nothing is applied
   */
  applyEdit(fileId: FileId, edits: readonly TextEdit[]): void {
    let text = this.assertLive(fileId);

    for (const edit of edits) {
      const source = new SourceText(text);
      let start: number | undefined;
      let end: number | undefined;
      if ("span" in edit) {
        start = edit.span.start;
        end = edit.span.end;
      } else {
        const offsets = computeLineStartOffsets(source);
        start = positionToByteIndex(source, offsets, edit.range.start);
        end = positionToByteIndex(source, offsets, edit.range.end);
      }
      if (start === undefined || end === undefined) {
        throw new BoundsError(`Edit range does not exist in file ${fileId}`);
      }
      text = source.slice(0, start) + edit.text + source.slice(end, source.byteLength);
    }

    fileTextInput.set(this.runtime, fileId, text);
  }

  removeFile(fileId: FileId): void {
    this.assertLive(fileId);
    fileTextInput.remove(this.runtime, fileId);
    fileNameInput.remove(this.runtime, fileId);
    allFileIdsInput.set(
      this.runtime,
      null,
      this.allFileIds().filter((id) => id !== fileId),
    );
    evictFile(this.runtime, fileId);
  }

  setTypeData(typeData: TypeData | undefined): void {
    if (typeData === undefined) {
      typeDataInput.remove(this.runtime, null);
    } else {
      typeDataInput.set(this.runtime, null, typeData);
    }
  }

  // Inputs

  fileText(fileId: FileId): string | undefined {
    return fileTextInput.get(this.runtime, fileId);
  }

  fileName(fileId: FileId): string | undefined {
    return fileNameInput.get(this.runtime, fileId);
  }

  allFileIds(): FileId[] {
    return allFileIdsInput.get(this.runtime, null) ?? [];
  }

  typeData(): TypeData | undefined {
    return typeDataInput.get(this.runtime, null);
  }

  // Pipeline

  sourceText(fileId: FileId): SourceText | undefined {
    return sourceTextQuery.get(this.runtime, fileId);
  }

  fileTokens(fileId: FileId): Token[] | undefined {
    return fileTokensQuery.get(this.runtime, fileId);
  }

  fileNodes(fileId: FileId): Node[] | undefined {
    return fileNodesQuery.get(this.runtime, fileId);
  }

  fileTree(fileId: FileId): Tree | undefined {
    return fileTreeQuery.get(this.runtime, fileId);
  }

  /** Diagnostics of every stage, tokenizer first */
  fileDiagnostics(fileId: FileId): Diagnostic[] | undefined {
    return fileDiagnosticsQuery.get(this.runtime, fileId);
  }

  // Positions

  lineStartOffsets(fileId: FileId): number[] | undefined {
    return lineStartOffsetsQuery.get(this.runtime, fileId);
  }

  positionToByteIndex(fileId: FileId, position: Position): number | undefined {
    return positionToByteIndexQuery.get(this.runtime, { fileId, position });
  }

  byteIndexToPosition(fileId: FileId, index: number): Position | undefined {
    return byteIndexToPositionQuery.get(this.runtime, { fileId, index });
  }

  spanToRange(span: ByteSpan): PositionRange | undefined {
    const start = this.byteIndexToPosition(span.fileId, span.start);
    const end = this.byteIndexToPosition(span.fileId, span.end);
    return start === undefined || end === undefined ? undefined : { start, end };
  }

  // Lookups

  tokenSpanningByteIndex(fileId: FileId, index: number): Token | undefined {
    return tokenSpanningByteIndexQuery.get(this.runtime, { fileId, index });
  }

  nodeSpanningByteIndex(fileId: FileId, index: number): TreeNodeRef | undefined {
    return nodeSpanningByteIndexQuery.get(this.runtime, { fileId, index });
  }

  /** Keyed, unindented children of the sentinel */
  topLevelNodes(fileId: FileId): TreeNodeRef[] | undefined {
    return topLevelNodesQuery.get(this.runtime, fileId);
  }

  topLevelNodeByKey(fileId: FileId, key: string): TreeNodeRef | undefined {
    return topLevelNodeByKeyQuery.get(this.runtime, { fileId, key });
  }

  topLevelNodesInAllFiles(): FileTopLevelNode[] {
    return topLevelNodesInAllFilesQuery.get(this.runtime, null);
  }

  /** Key span of the first top-level node named `key`, searching files in the order they were added */
  definitionSpan(key: string): ByteSpan | undefined {
    return definitionSpanQuery.get(this.runtime, key);
  }

  fileIdOfName(name: string): FileId | undefined {
    return fileIdOfNameQuery.get(this.runtime, name);
  }

  traitByName(name: string): TraitDetail | undefined {
    return traitByNameQuery.get(this.runtime, name);
  }

  // Language features

  hoverAt(fileId: FileId, position: Position): string | undefined {
    return hoverAtQuery.get(this.runtime, { fileId, position });
  }

  definitionAt(fileId: FileId, position: Position): DefinitionTarget | undefined {
    return definitionAtQuery.get(this.runtime, { fileId, position });
  }

  symbolsIn(fileId: FileId): DocumentSymbolInfo[] | undefined {
    return symbolsInQuery.get(this.runtime, fileId);
  }

  private assertLive(fileId: FileId): string {
    const text = this.fileText(fileId);
    if (text === undefined) {
      throw new UnknownFileError(fileId);
    }
    return text;
  }
}
