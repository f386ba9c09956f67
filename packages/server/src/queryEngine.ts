/**
 * Memoized, dependency-tracked queries.
 *
 * Inputs are set from outside. Derived queries are pure functions of
 * inputs and other derived queries; whatever they read while computing is
 * recorded, and on a later revision a memo is reused as long as none of
 * those reads changed. A recomputed value equal to the previous one keeps
 * its old `changedAt`, so queries that depend on it are not recomputed.
 *
 * Query objects are definitions only. Their tables live per runtime, which
 * is what lets `fork` hand out a read-only copy that later writes to the
 * original runtime cannot reach.
 */

import { DetachedRuntimeError, QueryCycleError, ReadOnlySnapshotError } from "./errors";
import { getLogger } from "./logger";

export type Revision = number;

export type QueryEventKind = "execute" | "memoHit" | "validated";

export interface QueryEvent {
  kind: QueryEventKind;
  query: string;
  keyId: string;
}

export interface QueryOptions<K, V> {
  /** Used to skip no-op input writes and to backdate recomputed values */
  equals?: (a: V, b: V) => boolean;
  /** Stable identity of a key; defaults to its JSON form */
  keyId?: (key: K) => string;
}

/** What every query exposes to the runtime */
export interface QueryNode<Db> {
  readonly name: string;
  /**
   * Revision at which the value stored under `keyId` last changed, after
   * bringing it up to date.
   */
  changedAt(runtime: QueryRuntime<Db>, keyId: string): Revision;
  /** Copy this query's table from one runtime into another */
  forkInto(from: QueryRuntime<Db>, to: QueryRuntime<Db>): void;
  /** Number of entries stored for `runtime` */
  memoCount(runtime: QueryRuntime<Db>): number;
}

interface Dependency<Db> {
  node: QueryNode<Db>;
  keyId: string;
}

interface Frame<Db> {
  node: QueryNode<Db>;
  keyId: string;
  dependencies: Dependency<Db>[];
  seen: Map<QueryNode<Db>, Set<string>>;
}

function defaultKeyId(key: unknown): string {
  return JSON.stringify(key) ?? "undefined";
}

export class QueryRuntime<Db> {
  readonly readOnly: boolean;
  onEvent?: (event: QueryEvent) => void;

  private currentRevision: Revision;
  private database?: Db;
  private readonly nodes = new Set<QueryNode<Db>>();
  private readonly frames: Frame<Db>[] = [];

  constructor(options: { readOnly?: boolean; revision?: Revision } = {}) {
    this.readOnly = options.readOnly ?? false;
    this.currentRevision = options.revision ?? 1;
  }

  get revision(): Revision {
    return this.currentRevision;
  }

  /** The database derived queries receive */
  get db(): Db {
    if (this.database === undefined) {
      throw new DetachedRuntimeError();
    }
    return this.database;
  }

  attach(database: Db): void {
    this.database = database;
  }

  register(node: QueryNode<Db>): void {
    this.nodes.add(node);
  }

  /**
   * A read-only runtime at the current revision. Tables are copied, the
   * records in them are shared; records are never mutated in place.
   */
  fork(): QueryRuntime<Db> {
    const forked = new QueryRuntime<Db>({ readOnly: true, revision: this.currentRevision });
    forked.onEvent = this.onEvent;
    for (const node of this.nodes) {
      node.forkInto(this, forked);
    }
    return forked;
  }

  /** Stored entries per query, for tests and diagnostics */
  memoCounts(): Map<string, number> {
    const counts = new Map<string, number>();
    for (const node of this.nodes) {
      counts.set(node.name, node.memoCount(this));
    }
    return counts;
  }

  /** Start a new revision for an input write */
  nextRevision(queryName: string): Revision {
    if (this.readOnly) {
      throw new ReadOnlySnapshotError(queryName);
    }
    this.currentRevision++;
    return this.currentRevision;
  }

  /** Record that the query being computed read `keyId` of `node` */
  recordRead(node: QueryNode<Db>, keyId: string): void {
    const frame = this.frames[this.frames.length - 1];
    if (frame === undefined) {
      return;
    }
    let keys = frame.seen.get(node);
    if (keys === undefined) {
      keys = new Set();
      frame.seen.set(node, keys);
    }
    if (keys.has(keyId)) {
      return;
    }
    keys.add(keyId);
    frame.dependencies.push({ node, keyId });
  }

  /** Run `compute` with read tracking, returning its value and what it read */
  execute<V>(
    node: QueryNode<Db>,
    keyId: string,
    compute: () => V,
  ): { value: V; dependencies: Dependency<Db>[] } {
    const cycleStart = this.frames.findIndex((f) => f.node === node && f.keyId === keyId);
    if (cycleStart !== -1) {
      const cycle = this.frames.slice(cycleStart).map((f) => `${f.node.name}(${f.keyId})`);
      cycle.push(`${node.name}(${keyId})`);
      throw new QueryCycleError(cycle);
    }

    this.emit({ kind: "execute", query: node.name, keyId });
    getLogger().debug(`Executing ${node.name}(${keyId}) at revision ${this.currentRevision}`);

    const frame: Frame<Db> = { node, keyId, dependencies: [], seen: new Map() };
    this.frames.push(frame);
    try {
      const value = compute();
      return { value, dependencies: frame.dependencies };
    } finally {
      this.frames.pop();
    }
  }

  emit(event: QueryEvent): void {
    this.onEvent?.(event);
  }
}

interface InputSlot<V> {
  readonly present: boolean;
  readonly value: V | undefined;
  readonly changedAt: Revision;
}

/** A value set from outside the database, keyed by `K` */
export class InputQuery<K, V> {
  readonly name: string;
  private readonly equals: (a: V, b: V) => boolean;
  private readonly keyIdOf: (key: K) => string;
  private readonly tables = new WeakMap<object, Map<string, InputSlot<V>>>();

  constructor(name: string, options: QueryOptions<K, V> = {}) {
    this.name = name;
    this.equals = options.equals ?? Object.is;
    this.keyIdOf = options.keyId ?? defaultKeyId;
  }

  /** The current value, or `undefined` when unset; the read is recorded either way */
  get<Db>(runtime: QueryRuntime<Db>, key: K): V | undefined {
    const keyId = this.keyIdOf(key);
    runtime.recordRead(this, keyId);
    return this.table(runtime).get(keyId)?.value;
  }

  has<Db>(runtime: QueryRuntime<Db>, key: K): boolean {
    return this.table(runtime).get(this.keyIdOf(key))?.present ?? false;
  }

  set<Db>(runtime: QueryRuntime<Db>, key: K, value: V): void {
    const keyId = this.keyIdOf(key);
    const table = this.table(runtime);
    const slot = table.get(keyId);
    if (runtime.readOnly) {
      throw new ReadOnlySnapshotError(this.name);
    }
    if (slot !== undefined && slot.present && slot.value !== undefined && this.equals(slot.value, value)) {
      return;
    }
    const changedAt = runtime.nextRevision(this.name);
    table.set(keyId, { present: true, value, changedAt });
  }

  remove<Db>(runtime: QueryRuntime<Db>, key: K): void {
    const keyId = this.keyIdOf(key);
    const table = this.table(runtime);
    const slot = table.get(keyId);
    if (runtime.readOnly) {
      throw new ReadOnlySnapshotError(this.name);
    }
    if (slot === undefined || !slot.present) {
      return;
    }
    const changedAt = runtime.nextRevision(this.name);
    table.set(keyId, { present: false, value: undefined, changedAt });
  }

  changedAt<Db>(runtime: QueryRuntime<Db>, keyId: string): Revision {
    return this.table(runtime).get(keyId)?.changedAt ?? 0;
  }

  forkInto<Db>(from: QueryRuntime<Db>, to: QueryRuntime<Db>): void {
    const table = this.tables.get(from);
    if (table !== undefined) {
      this.tables.set(to, new Map(table));
      to.register(this);
    }
  }

  /** Slots kept for `runtime`, removed ones included */
  memoCount<Db>(runtime: QueryRuntime<Db>): number {
    return this.tables.get(runtime)?.size ?? 0;
  }

  private table<Db>(runtime: QueryRuntime<Db>): Map<string, InputSlot<V>> {
    let table = this.tables.get(runtime);
    if (table === undefined) {
      table = new Map();
      this.tables.set(runtime, table);
      runtime.register(this);
    }
    return table;
  }
}

interface Memo<Db, K, V> {
  readonly key: K;
  readonly value: V;
  readonly changedAt: Revision;
  readonly verifiedAt: Revision;
  readonly dependencies: readonly Dependency<Db>[];
}

/** A memoized pure function of other queries */
export class DerivedQuery<Db, K, V> implements QueryNode<Db> {
  readonly name: string;
  private readonly compute: (db: Db, key: K) => V;
  private readonly equals: (a: V, b: V) => boolean;
  private readonly keyIdOf: (key: K) => string;
  private readonly tables = new WeakMap<object, Map<string, Memo<Db, K, V>>>();

  constructor(name: string, compute: (db: Db, key: K) => V, options: QueryOptions<K, V> = {}) {
    this.name = name;
    this.compute = compute;
    this.equals = options.equals ?? Object.is;
    this.keyIdOf = options.keyId ?? defaultKeyId;
  }

  get(runtime: QueryRuntime<Db>, key: K): V {
    const keyId = this.keyIdOf(key);
    runtime.recordRead(this, keyId);
    return this.refresh(runtime, key, keyId).value;
  }

  changedAt(runtime: QueryRuntime<Db>, keyId: string): Revision {
    const memo = this.table(runtime).get(keyId);
    if (memo === undefined) {
      return runtime.revision;
    }
    return this.refresh(runtime, memo.key, keyId).changedAt;
  }

  forkInto(from: QueryRuntime<Db>, to: QueryRuntime<Db>): void {
    const table = this.tables.get(from);
    if (table !== undefined) {
      this.tables.set(to, new Map(table));
      to.register(this);
    }
  }

  /** Number of memoized keys, for tests and diagnostics */
  memoCount(runtime: QueryRuntime<Db>): number {
    return this.tables.get(runtime)?.size ?? 0;
  }

  /**
   * Drop the memos whose key matches. Queries that read an evicted memo
   * see it as changed and recompute.
   */
  evict(runtime: QueryRuntime<Db>, matches: (key: K) => boolean): number {
    if (runtime.readOnly) {
      throw new ReadOnlySnapshotError(this.name);
    }
    const table = this.tables.get(runtime);
    if (table === undefined) {
      return 0;
    }
    let evicted = 0;
    for (const [keyId, memo] of table) {
      if (matches(memo.key)) {
        table.delete(keyId);
        evicted++;
      }
    }
    return evicted;
  }

  private refresh(runtime: QueryRuntime<Db>, key: K, keyId: string): Memo<Db, K, V> {
    const table = this.table(runtime);
    const revision = runtime.revision;
    const memo = table.get(keyId);

    if (memo !== undefined && memo.verifiedAt === revision) {
      runtime.emit({ kind: "memoHit", query: this.name, keyId });
      return memo;
    }

    if (memo !== undefined && this.dependenciesUnchanged(runtime, memo)) {
      const verified: Memo<Db, K, V> = { ...memo, verifiedAt: revision };
      table.set(keyId, verified);
      runtime.emit({ kind: "validated", query: this.name, keyId });
      return verified;
    }

    const { value, dependencies } = runtime.execute(this, keyId, () =>
      this.compute(runtime.db, key),
    );
    const fresh: Memo<Db, K, V> =
      memo !== undefined && this.equals(memo.value, value)
        ? { key, value: memo.value, changedAt: memo.changedAt, verifiedAt: revision, dependencies }
        : { key, value, changedAt: revision, verifiedAt: revision, dependencies };
    table.set(keyId, fresh);
    return fresh;
  }

  private dependenciesUnchanged(runtime: QueryRuntime<Db>, memo: Memo<Db, K, V>): boolean {
    return memo.dependencies.every(
      (dependency) => dependency.node.changedAt(runtime, dependency.keyId) <= memo.verifiedAt,
    );
  }

  private table(runtime: QueryRuntime<Db>): Map<string, Memo<Db, K, V>> {
    let table = this.tables.get(runtime);
    if (table === undefined) {
      table = new Map();
      this.tables.set(runtime, table);
      runtime.register(this);
    }
    return table;
  }
}

/** Element-wise `Object.is` comparison, for array-valued queries */
export function arraysEqual<T>(a: readonly T[] | undefined, b: readonly T[] | undefined): boolean {
  if (a === b) return true;
  if (a === undefined || b === undefined || a.length !== b.length) return false;
  return a.every((item, index) => Object.is(item, b[index]));
}
