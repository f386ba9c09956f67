#!/usr/bin/env node
import * as path from "path";
import { fileURLToPath, pathToFileURL } from "url";
import {
  createConnection,
  InitializeParams,
  InitializeResult,
  PositionEncodingKind,
  ProposedFeatures,
  TextDocumentSyncKind,
} from "vscode-languageserver/node";
import { TextDocument } from "vscode-languageserver-textdocument";
import { resolveConfig, SLOW_WORK_FACTOR, type ServerConfig } from "./config";
import type { SpanEdit } from "./database";
import { Dispatcher } from "./dispatch";
import { createConnectionLogger, getLogger, setLogger } from "./logger";
import { byteSpanOfRange, toLspDiagnostic, type PositionEncoding } from "./lspConvert";
import { QuerySystem, type DiagnosticsUpdate } from "./querySystem";
import { definitionAction, documentSymbolsAction, hoverAction } from "./requests";
import { loadTypeData } from "./typeData";
import { WorkPool } from "./workPool";

const connection = createConnection(ProposedFeatures.all);
const documents = new Map<string, TextDocument>();
let config: ServerConfig | undefined;
let encoding: PositionEncoding = "utf-16";
let querySystem: QuerySystem | undefined;

/**
 * Normalize a file URI to a consistent key for the documents map.
 * Converts URI to file path and back to ensure consistent encoding.
 */
function normalizeUri(uri: string): string {
  if (!uri.startsWith("file:")) {
    return uri;
  }
  try {
    return pathToFileURL(fileURLToPath(uri)).toString();
  } catch {
    return uri;
  }
}

/**
 * First workspace folder, falling back to the root URI.
 */
function resolveWorkspaceRoot(params: InitializeParams): string | undefined {
  const candidates = [
    ...(params.workspaceFolders ?? []).map((folder) => folder.uri),
    ...(params.rootUri ? [params.rootUri] : []),
  ];
  for (const uri of candidates) {
    if (!uri.startsWith("file:")) continue;
    try {
      return path.resolve(fileURLToPath(uri));
    } catch {
      // ignore invalid workspace uri
    }
  }
  return undefined;
}

function publishDiagnostics({ uri, fileId, diagnostics, snapshot }: DiagnosticsUpdate): void {
  const converted =
    fileId === undefined
      ? []
      : diagnostics.map((diagnostic) => toLspDiagnostic(snapshot, uri, fileId, diagnostic, encoding));
  connection.sendDiagnostics({ uri, diagnostics: converted }).catch((error: unknown) => {
    getLogger().error(`Failed to publish diagnostics for ${uri}`, error);
  });
}

connection.onInitialize((params: InitializeParams): InitializeResult => {
  const workspaceRoot = resolveWorkspaceRoot(params);
  config = resolveConfig(params.initializationOptions, process.env, workspaceRoot);
  setLogger(createConnectionLogger(connection.console, config.logLevel));

  const offered = params.capabilities.general?.positionEncodings ?? [];
  encoding = offered.includes(PositionEncodingKind.UTF32) ? "utf-32" : "utf-16";

  const pool = new WorkPool({
    maxConcurrentWork: config.maxConcurrentWork,
    maxSimilarConcurrentWork: config.maxSimilarConcurrentWork,
    slowWorkMs: config.requestTimeoutMs * SLOW_WORK_FACTOR,
  });
  querySystem = new QuerySystem({
    dispatcher: new Dispatcher(pool, config.requestTimeoutMs),
    onDiagnostics: publishDiagnostics,
  });

  return {
    capabilities: {
      positionEncoding: encoding === "utf-32" ? PositionEncodingKind.UTF32 : PositionEncodingKind.UTF16,
      textDocumentSync: TextDocumentSyncKind.Incremental,
      hoverProvider: true,
      definitionProvider: true,
      documentSymbolProvider: true,
    },
  };
});

connection.onInitialized(async () => {
  connection.console.info("MiniYaml language server initialized.");

  const typeDataPath = config?.typeDataPath;
  if (!typeDataPath) {
    connection.console.info("No workspace root or type data path configured, hover shows token text only.");
    return;
  }
  const typeData = await loadTypeData(typeDataPath);
  if (typeData) {
    connection.console.info(`Loaded ${typeData.length} trait(s) from ${typeDataPath}.`);
  }
  querySystem?.send({ kind: "typeDataLoaded", typeData });
});

connection.onDidOpenTextDocument((params) => {
  const uri = normalizeUri(params.textDocument.uri);
  const document = TextDocument.create(
    uri,
    params.textDocument.languageId,
    params.textDocument.version,
    params.textDocument.text,
  );
  documents.set(uri, document);
  querySystem?.send({ kind: "fileOpened", uri, text: document.getText() });
});

connection.onDidChangeTextDocument((params) => {
  const uri = normalizeUri(params.textDocument.uri);
  let document = documents.get(uri);
  if (!document) {
    return;
  }

  // Each change applies to the text left by the one before it
  const edits: SpanEdit[] = [];
  for (const change of params.contentChanges) {
    if ("range" in change) {
      const { start, end, utf16Range } = byteSpanOfRange(document, change.range, encoding);
      edits.push({ span: { start, end }, text: change.text });
      document = TextDocument.update(
        document,
        [{ range: utf16Range, text: change.text }],
        params.textDocument.version,
      );
    } else {
      const end = Buffer.byteLength(document.getText(), "utf8");
      edits.push({ span: { start: 0, end }, text: change.text });
      document = TextDocument.update(document, [{ text: change.text }], params.textDocument.version);
    }
  }

  documents.set(uri, document);
  querySystem?.send({ kind: "fileChanged", uri, edits, text: document.getText() });
});

connection.onDidCloseTextDocument((params) => {
  const uri = normalizeUri(params.textDocument.uri);
  documents.delete(uri);
  querySystem?.send({ kind: "fileClosed", uri });
});

connection.onHover((params) => {
  if (!querySystem) {
    return null;
  }
  return querySystem.request(hoverAction, {
    uri: normalizeUri(params.textDocument.uri),
    position: params.position,
    encoding,
  });
});

connection.onDefinition((params) => {
  if (!querySystem) {
    return null;
  }
  return querySystem.request(definitionAction, {
    uri: normalizeUri(params.textDocument.uri),
    position: params.position,
    encoding,
  });
});

connection.onDocumentSymbol((params) => {
  if (!querySystem) {
    return [];
  }
  return querySystem.request(documentSymbolsAction, {
    uri: normalizeUri(params.textDocument.uri),
    encoding,
  });
});

connection.listen();
