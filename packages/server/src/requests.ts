import {
  MarkupKind,
  type DocumentSymbol,
  type Hover,
  type Location,
  type Position as LspPosition,
} from "vscode-languageserver/node";
import {
  toCorePosition,
  toDocumentSymbol,
  toLspRange,
  type PositionEncoding,
} from "./lspConvert";
import type { QueryAction } from "./querySystem";

export interface PositionRequest {
  uri: string;
  position: LspPosition;
  encoding: PositionEncoding;
}

export interface DocumentRequest {
  uri: string;
  encoding: PositionEncoding;
}

export const hoverAction: QueryAction<PositionRequest, Hover | null> = {
  method: "textDocument/hover",
  fallback: () => null,
  handle({ db, fileIdOf, params }) {
    const fileId = fileIdOf(params.uri);
    if (fileId === undefined) return null;
    const position = toCorePosition(db, fileId, params.position, params.encoding);
    const text = position === undefined ? undefined : db.hoverAt(fileId, position);
    if (text === undefined) return null;
    return { contents: { kind: MarkupKind.Markdown, value: text } };
  },
};

export const definitionAction: QueryAction<PositionRequest, Location | null> = {
  method: "textDocument/definition",
  fallback: () => null,
  handle({ db, fileIdOf, params }) {
    const fileId = fileIdOf(params.uri);
    if (fileId === undefined) return null;
    const position = toCorePosition(db, fileId, params.position, params.encoding);
    const target = position === undefined ? undefined : db.definitionAt(fileId, position);
    if (target === undefined) return null;

    const uri = db.fileName(target.fileId);
    if (uri === undefined) return null;
    return {
      uri,
      range: toLspRange(db, target.fileId, { start: target.start, end: target.end }, params.encoding),
    };
  },
};

export const documentSymbolsAction: QueryAction<DocumentRequest, DocumentSymbol[]> = {
  method: "textDocument/documentSymbol",
  fallback: () => [],
  handle({ db, fileIdOf, params }) {
    const fileId = fileIdOf(params.uri);
    if (fileId === undefined) return [];
    return (db.symbolsIn(fileId) ?? []).map((symbol) =>
      toDocumentSymbol(db, fileId, symbol, params.encoding),
    );
  },
};
