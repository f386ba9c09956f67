import { ErrorCodes, ResponseError } from "vscode-languageserver/node";
import { getLogger } from "./logger";
import type { WorkPool } from "./workPool";

/**
 * A request that runs on the work pool. `fallback` answers whenever the
 * real work is skipped: the request waited past its timeout before it
 * could start, or the pool refused it.
 */
export interface RequestAction<P, R> {
  readonly method: string;
  /** Overrides the dispatcher's default timeout */
  readonly timeoutMs?: number;
  fallback(): R;
  handle(params: P): R | Promise<R>;
}

export class Dispatcher {
  private readonly pool: WorkPool;
  private readonly defaultTimeoutMs: number;
  private readonly now: () => number;

  constructor(pool: WorkPool, defaultTimeoutMs: number, now: () => number = Date.now) {
    this.pool = pool;
    this.defaultTimeoutMs = defaultTimeoutMs;
    this.now = now;
  }

  /**
   * Run `action` for a request received at `receivedAt`. Never rejects:
   * failures come back as an internal-error `ResponseError`.
   */
  async dispatch<P, R>(
    action: RequestAction<P, R>,
    params: P,
    receivedAt: number = this.now(),
  ): Promise<R | ResponseError<void>> {
    const timeoutMs = action.timeoutMs ?? this.defaultTimeoutMs;

    const outcome = await this.pool.run(action.method, () => {
      // Checked once the work is scheduled, since scheduling itself may be late
      const waited = this.now() - receivedAt;
      if (waited >= timeoutMs) {
        getLogger().debug(`${action.method} waited ${waited}ms before starting, answering with fallback`);
        return action.fallback();
      }
      return action.handle(params);
    });

    switch (outcome.status) {
      case "done":
        return outcome.value;
      case "refused":
        return action.fallback();
      case "failed": {
        const detail = outcome.error instanceof Error ? outcome.error.message : String(outcome.error);
        return new ResponseError<void>(
          ErrorCodes.InternalError,
          `${action.method} failed: ${detail}`,
        );
      }
    }
  }
}
