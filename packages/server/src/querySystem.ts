/**
 * Single writer in front of the database.
 *
 * Messages are queued and handled in turns. A turn first applies every
 * mutation up to the last one queued, then serves one read against a
 * fresh snapshot, so a read never misses an edit that was queued before
 * it and never sees an edit half-applied.
 *
 * Snapshots start from the live database's memos. Diagnostics are computed
 * on the live database, which keeps the parse of every open file warm;
 * whatever a read computes stays in its snapshot.
 */

import type { ResponseError } from "vscode-languageserver/node";
import { MiniYamlDatabase, type SpanEdit } from "./database";
import type { Diagnostic } from "./diagnostics";
import type { Dispatcher, RequestAction } from "./dispatch";
import { getLogger } from "./logger";
import type { FileId } from "./span";
import type { TypeData } from "./typeData";

export type MutationMessage =
  | { kind: "fileOpened"; uri: string; text: string }
  | {
      kind: "fileChanged";
      uri: string;
      edits: SpanEdit[];
      /** Expected text after the edits; used when the edits cannot be applied */
      text?: string;
    }
  | { kind: "fileClosed"; uri: string }
  | { kind: "typeDataLoaded"; typeData: TypeData | undefined };

interface ReadMessage {
  kind: "read";
  method: string;
  serve(snapshot: MiniYamlDatabase): Promise<void>;
}

type QueryMessage = MutationMessage | ReadMessage;

/** What a read handler receives */
export interface ReadContext<P> {
  db: MiniYamlDatabase;
  fileIdOf(uri: string): FileId | undefined;
  params: P;
}

export type QueryAction<P, R> = RequestAction<ReadContext<P>, R>;

export interface DiagnosticsUpdate {
  uri: string;
  /** Undefined once the file was closed */
  fileId?: FileId;
  diagnostics: Diagnostic[];
  snapshot: MiniYamlDatabase;
}

export interface QuerySystemOptions {
  dispatcher: Dispatcher;
  onDiagnostics?: (update: DiagnosticsUpdate) => void;
  now?: () => number;
  db?: MiniYamlDatabase;
}

function isMutation(message: QueryMessage): message is MutationMessage {
  return message.kind !== "read";
}

export class QuerySystem {
  readonly db: MiniYamlDatabase;
  private readonly dispatcher: Dispatcher;
  private readonly onDiagnostics?: (update: DiagnosticsUpdate) => void;
  private readonly now: () => number;

  private readonly fileIds = new Map<string, FileId>();
  private queue: QueryMessage[] = [];
  private turnScheduled = false;
  private needsDiagnostics = false;
  private readonly touched = new Set<string>();

  constructor(options: QuerySystemOptions) {
    this.db = options.db ?? new MiniYamlDatabase();
    this.dispatcher = options.dispatcher;
    this.onDiagnostics = options.onDiagnostics;
    this.now = options.now ?? Date.now;
  }

  get pendingCount(): number {
    return this.queue.length;
  }

  fileIdOf(uri: string): FileId | undefined {
    return this.fileIds.get(uri);
  }

  send(message: MutationMessage): void {
    this.enqueue(message);
  }

  /** Queue a read; it resolves with the action's result, fallback or error */
  request<P, R>(action: QueryAction<P, R>, params: P): Promise<R | ResponseError<void>> {
    const receivedAt = this.now();
    return new Promise((resolve) => {
      this.enqueue({
        kind: "read",
        method: action.method,
        serve: async (snapshot) => {
          const fileIds = new Map(this.fileIds);
          const context: ReadContext<P> = {
            db: snapshot,
            fileIdOf: (uri) => fileIds.get(uri),
            params,
          };
          resolve(await this.dispatcher.dispatch(action, context, receivedAt));
        },
      });
    });
  }

  /** Handle one turn now instead of waiting for the scheduled one */
  processTurn(): void {
    const lastMutation = this.findLastMutationIndex();
    if (lastMutation !== -1) {
      const batch = this.queue.slice(0, lastMutation + 1);
      this.queue = [...batch.filter((m) => !isMutation(m)), ...this.queue.slice(lastMutation + 1)];
      for (const message of batch) {
        if (isMutation(message)) {
          this.apply(message);
        }
      }
      this.needsDiagnostics = true;
    }

    if (this.needsDiagnostics) {
      this.publishDiagnostics();
    }

    const read = this.queue.shift();
    if (read !== undefined && !isMutation(read)) {
      read.serve(this.db.snapshot()).catch((error: unknown) => {
        getLogger().error(`Serving ${read.method} failed`, error);
      });
    }
  }

  private enqueue(message: QueryMessage): void {
    this.queue.push(message);
    this.scheduleTurn();
  }

  private scheduleTurn(): void {
    if (this.turnScheduled) {
      return;
    }
    this.turnScheduled = true;
    setImmediate(() => {
      this.turnScheduled = false;
      this.processTurn();
      if (this.queue.length > 0) {
        this.scheduleTurn();
      }
    });
  }

  private findLastMutationIndex(): number {
    for (let i = this.queue.length - 1; i >= 0; i--) {
      if (isMutation(this.queue[i])) {
        return i;
      }
    }
    return -1;
  }

  private apply(message: MutationMessage): void {
    try {
      switch (message.kind) {
        case "fileOpened": {
          const existing = this.fileIds.get(message.uri);
          if (existing === undefined) {
            this.fileIds.set(message.uri, this.db.addFile(message.uri, message.text));
          } else {
            this.db.setFileText(existing, message.text);
          }
          this.touched.add(message.uri);
          return;
        }
        case "fileChanged":
          this.applyChange(message.uri, message.edits, message.text);
          return;
        case "fileClosed": {
          const fileId = this.fileIds.get(message.uri);
          if (fileId !== undefined) {
            this.db.removeFile(fileId);
            this.fileIds.delete(message.uri);
            this.touched.add(message.uri);
          }
          return;
        }
        case "typeDataLoaded":
          this.db.setTypeData(message.typeData);
          return;
      }
    } catch (error) {
      getLogger().error(`Failed to apply ${message.kind}`, error);
    }
  }

  private applyChange(uri: string, edits: SpanEdit[], text: string | undefined): void {
    const fileId = this.fileIds.get(uri);
    if (fileId === undefined) {
      getLogger().warn(`Ignoring change to ${uri}, which is not open`);
      return;
    }
    this.touched.add(uri);
    try {
      this.db.applyEdit(fileId, edits);
    } catch (error) {
      if (text === undefined) {
        throw error;
      }
      getLogger().warn(`Edits to ${uri} could not be applied, replacing the whole text: ${String(error)}`);
      this.db.setFileText(fileId, text);
    }
  }

  private publishDiagnostics(): void {
    this.needsDiagnostics = false;
    if (this.onDiagnostics === undefined) {
      this.touched.clear();
      return;
    }

    // Computed on the live database so that its memos carry into later snapshots
    const updates = [...this.touched].map((uri) => {
      const fileId = this.fileIds.get(uri);
      const diagnostics = fileId === undefined ? [] : (this.db.fileDiagnostics(fileId) ?? []);
      return { uri, fileId, diagnostics };
    });
    const snapshot = this.db.snapshot();
    for (const { uri, fileId, diagnostics } of updates) {
      try {
        this.onDiagnostics({ uri, fileId, diagnostics, snapshot });
      } catch (error) {
        getLogger().error(`Publishing diagnostics for ${uri} failed`, error);
      }
    }
    this.touched.clear();
  }
}
