import { getLogger } from "./logger";

export type WorkOutcome<T> =
  | { status: "done"; value: T }
  | { status: "refused" }
  | { status: "failed"; error: unknown };

export interface WorkPoolOptions {
  /** Total in-flight work allowed */
  maxConcurrentWork: number;
  /** In-flight work allowed per description */
  maxSimilarConcurrentWork: number;
  /** Work running at least this long is logged */
  slowWorkMs: number;
  now?: () => number;
}

/**
 * Admission control for request work.
 *
 * Work past either limit is refused at once rather than queued, so a
 * flood of one kind of request cannot starve the rest. Admitted work
 * starts on a later macrotask and always settles: a thrown error becomes
 * a `failed` outcome.
 */
export class WorkPool {
  private readonly options: WorkPoolOptions;
  private readonly now: () => number;
  private readonly inFlight: string[] = [];

  constructor(options: WorkPoolOptions) {
    this.options = options;
    this.now = options.now ?? Date.now;
  }

  get activeCount(): number {
    return this.inFlight.length;
  }

  activeCountOf(description: string): number {
    return this.inFlight.filter((d) => d === description).length;
  }

  async run<T>(description: string, work: () => T | Promise<T>): Promise<WorkOutcome<T>> {
    if (this.inFlight.length >= this.options.maxConcurrentWork) {
      getLogger().warn(
        `Refused to start ${description}: at work capacity with [${this.inFlight.join(", ")}] in progress`,
      );
      return { status: "refused" };
    }
    if (this.activeCountOf(description) >= this.options.maxSimilarConcurrentWork) {
      getLogger().info(
        `Refused to start ${description}: similar work is filling capacity with [${this.inFlight.join(", ")}] in progress`,
      );
      return { status: "refused" };
    }

    this.inFlight.push(description);
    try {
      await new Promise<void>((resolve) => setImmediate(resolve));
      const start = this.now();
      try {
        return { status: "done", value: await work() };
      } catch (error) {
        getLogger().error(`${description} failed`, error);
        return { status: "failed", error };
      } finally {
        const elapsed = this.now() - start;
        if (elapsed >= this.options.slowWorkMs) {
          getLogger().warn(`${description} took ${(elapsed / 1000).toFixed(1)}s`);
        }
      }
    } finally {
      this.inFlight.splice(this.inFlight.indexOf(description), 1);
    }
  }
}
