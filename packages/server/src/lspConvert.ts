/**
 * Conversions between core results and LSP types.
 *
 * Core positions count Unicode scalar values. A client that negotiated
 * `utf-32` uses the same unit; anything else gets UTF-16 columns.
 */

import {
  DiagnosticSeverity,
  SymbolKind,
  type Diagnostic as LspDiagnostic,
  type DiagnosticRelatedInformation,
  type DocumentSymbol,
  type Position as LspPosition,
  type Range as LspRange,
} from "vscode-languageserver/node";
import type { TextDocument } from "vscode-languageserver-textdocument";
import type { MiniYamlDatabase } from "./database";
import type { Diagnostic, Severity } from "./diagnostics";
import type { DocumentSymbolInfo } from "./languageQueries";
import type { FileId, Position, PositionRange } from "./span";

export type PositionEncoding = "utf-16" | "utf-32";

export const DIAGNOSTIC_SOURCE = "miniyaml";

const SEVERITY: Record<Severity, DiagnosticSeverity> = {
  bug: DiagnosticSeverity.Error,
  error: DiagnosticSeverity.Error,
  warning: DiagnosticSeverity.Warning,
};

/** Scalar-value column of a UTF-16 column in `line` (clamped to the line) */
export function utf16ToScalarColumn(line: string, column: number): number {
  let units = 0;
  let scalars = 0;
  for (const ch of line) {
    if (units >= column) break;
    units += ch.length;
    scalars++;
  }
  return scalars;
}

/** UTF-16 column of a scalar-value column in `line` (clamped to the line) */
export function scalarToUtf16Column(line: string, column: number): number {
  let units = 0;
  let scalars = 0;
  for (const ch of line) {
    if (scalars >= column) break;
    units += ch.length;
    scalars++;
  }
  return units;
}

function withoutTerminator(line: string): string {
  return line.replace(/\r?\n$/, "");
}

/** Content of line `line` of a file as the snapshot sees it */
function lineText(db: MiniYamlDatabase, fileId: FileId, line: number): string | undefined {
  const source = db.sourceText(fileId);
  const offsets = db.lineStartOffsets(fileId);
  if (source === undefined || offsets === undefined || line < 0 || line >= offsets.length) {
    return undefined;
  }
  const end = line + 1 < offsets.length ? offsets[line + 1] : source.byteLength;
  return withoutTerminator(source.slice(offsets[line], end));
}

export function toCorePosition(
  db: MiniYamlDatabase,
  fileId: FileId,
  position: LspPosition,
  encoding: PositionEncoding,
): Position | undefined {
  if (encoding === "utf-32") {
    return { line: position.line, character: position.character };
  }
  const text = lineText(db, fileId, position.line);
  if (text === undefined) {
    return undefined;
  }
  return { line: position.line, character: utf16ToScalarColumn(text, position.character) };
}

export function toLspPosition(
  db: MiniYamlDatabase,
  fileId: FileId,
  position: Position,
  encoding: PositionEncoding,
): LspPosition {
  if (encoding === "utf-32") {
    return { line: position.line, character: position.character };
  }
  const text = lineText(db, fileId, position.line) ?? "";
  return { line: position.line, character: scalarToUtf16Column(text, position.character) };
}

export function toLspRange(
  db: MiniYamlDatabase,
  fileId: FileId,
  range: PositionRange,
  encoding: PositionEncoding,
): LspRange {
  return {
    start: toLspPosition(db, fileId, range.start, encoding),
    end: toLspPosition(db, fileId, range.end, encoding),
  };
}

const EMPTY_RANGE: LspRange = {
  start: { line: 0, character: 0 },
  end: { line: 0, character: 0 },
};

/** Help and note children are folded into the message */
export function toLspDiagnostic(
  db: MiniYamlDatabase,
  uri: string,
  fileId: FileId,
  diagnostic: Diagnostic,
  encoding: PositionEncoding,
): LspDiagnostic {
  const spanRange = diagnostic.span === undefined ? undefined : db.spanToRange(diagnostic.span);
  const range = spanRange === undefined ? EMPTY_RANGE : toLspRange(db, fileId, spanRange, encoding);

  const message = [
    diagnostic.message,
    ...diagnostic.children.map((child) => `${child.severity}: ${child.message}`),
  ].join("\n");

  const relatedInformation: DiagnosticRelatedInformation[] = [];
  for (const label of diagnostic.labels) {
    const labelRange = db.spanToRange(label.span);
    if (labelRange === undefined) continue;
    relatedInformation.push({
      location: { uri, range: toLspRange(db, label.span.fileId, labelRange, encoding) },
      message: label.message ?? diagnostic.message,
    });
  }

  const converted: LspDiagnostic = {
    range,
    severity: SEVERITY[diagnostic.severity],
    code: diagnostic.code,
    source: DIAGNOSTIC_SOURCE,
    message,
  };
  if (relatedInformation.length > 0) {
    converted.relatedInformation = relatedInformation;
  }
  return converted;
}

export function toDocumentSymbol(
  db: MiniYamlDatabase,
  fileId: FileId,
  symbol: DocumentSymbolInfo,
  encoding: PositionEncoding,
): DocumentSymbol {
  return {
    name: symbol.name,
    detail: symbol.detail,
    kind: symbol.children.length > 0 ? SymbolKind.Object : SymbolKind.Property,
    range: toLspRange(db, fileId, symbol.range, encoding),
    selectionRange: toLspRange(db, fileId, symbol.selectionRange, encoding),
    children: symbol.children.map((child) => toDocumentSymbol(db, fileId, child, encoding)),
  };
}

/**
 * UTF-16 offset into `document` of a client position, clamped to the
 * position's line.
 */
export function documentOffsetOf(
  document: TextDocument,
  position: LspPosition,
  encoding: PositionEncoding,
): number {
  if (encoding === "utf-16") {
    return document.offsetAt(position);
  }
  const lineStart = document.offsetAt({ line: position.line, character: 0 });
  const nextLineStart = document.offsetAt({ line: position.line + 1, character: 0 });
  const line = withoutTerminator(document.getText().slice(lineStart, nextLineStart));
  return lineStart + scalarToUtf16Column(line, position.character);
}

/** Byte span of a client range in the document's current text */
export function byteSpanOfRange(
  document: TextDocument,
  range: LspRange,
  encoding: PositionEncoding,
): { start: number; end: number; utf16Range: LspRange } {
  const text = document.getText();
  const startOffset = documentOffsetOf(document, range.start, encoding);
  const endOffset = Math.max(startOffset, documentOffsetOf(document, range.end, encoding));
  return {
    start: Buffer.byteLength(text.slice(0, startOffset), "utf8"),
    end: Buffer.byteLength(text.slice(0, endOffset), "utf8"),
    utf16Range: { start: document.positionAt(startOffset), end: document.positionAt(endOffset) },
  };
}
