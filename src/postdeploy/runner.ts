/**
 * Post-Deploy Runner
 *
 * Executes the post-deploy queue after a successful template deployment:
 * - Runs actions one at a time in declaration order
 * - Keeps going after a failure and reports every outcome
 * - Applies a per-action timeout
 * - Marks remaining actions cancelled once the signal aborts
 * - Emits lifecycle events
 *
 * Actions are never retried.
 */

import { DeploymentError, OperationCancelledError, formatError } from "../core/errors.js";
import type { Logger } from "../logging/index.js";
import { getLogger } from "../logging/index.js";
import type {
  PostDeployAction,
  PostDeployContext,
  PostDeployEvent,
  PostDeployEventListener,
  PostDeployOptions,
  PostDeployOutcome,
  PostDeployReport,
} from "./types.js";

// =============================================================================
// Default Options
// =============================================================================

export const DEFAULT_ACTION_TIMEOUT_MS = 900_000; // 15 min per action

export type PostDeployRunContext = Omit<PostDeployContext, "log" | "signal"> & { log?: Logger };

// =============================================================================
// PostDeployRunner
// =============================================================================

export class PostDeployRunner {
  private actionTimeoutMs: number;
  private signal?: AbortSignal;
  private listeners: PostDeployEventListener[] = [];

  constructor(options?: PostDeployOptions) {
    this.actionTimeoutMs = options?.actionTimeoutMs ?? DEFAULT_ACTION_TIMEOUT_MS;
    this.signal = options?.signal;
  }

  /** Subscribe to runner lifecycle events. */
  on(listener: PostDeployEventListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  private emit(event: Omit<PostDeployEvent, "timestamp">, log: Logger): void {
    const stamped: PostDeployEvent = { ...event, timestamp: new Date().toISOString() };
    for (const listener of this.listeners) {
      try {
        listener(stamped);
      } catch (err) {
        log.warn(`Post-deploy event listener failed: ${formatError(err)}`, { event: event.type });
      }
    }
  }

  /**
   * Run every action in order and collect the outcomes.
   */
  async run(actions: readonly PostDeployAction[], context: PostDeployRunContext): Promise<PostDeployReport> {
    const started = Date.now();
    const log = context.log ?? getLogger("postdeploy");
    const total = actions.length;
    const outcomes: PostDeployOutcome[] = [];

    this.emit(
      {
        type: "postdeploy:start",
        message: `Running ${total} post-deploy action${total === 1 ? "" : "s"}`,
        progress: { completed: 0, total },
      },
      log,
    );

    for (const action of actions) {
      const outcome = this.signal?.aborted
        ? this.cancelled(action, 0, log)
        : await this.runAction(action, context, log);
      outcomes.push(outcome);

      const progress = { completed: outcomes.length, total };
      if (outcome.status === "succeeded") {
        this.emit(
          { type: "action:complete", resourceName: action.resourceName, message: outcome.detail ?? action.description, progress },
          log,
        );
      } else if (outcome.status === "failed") {
        this.emit(
          {
            type: "action:failed",
            resourceName: action.resourceName,
            message: `${action.description} failed`,
            error: outcome.error,
            progress,
          },
          log,
        );
      }
    }

    const success = outcomes.every((o) => o.status === "succeeded");
    const failed = outcomes.filter((o) => o.status !== "succeeded").length;
    this.emit(
      success
        ? { type: "postdeploy:complete", message: `All ${total} post-deploy actions succeeded` }
        : { type: "postdeploy:failed", message: `${failed} of ${total} post-deploy actions did not succeed` },
      log,
    );

    const completed = Date.now();
    return {
      success,
      outcomes,
      startedAt: new Date(started).toISOString(),
      completedAt: new Date(completed).toISOString(),
      totalDurationMs: completed - started,
    };
  }

  private async runAction(action: PostDeployAction, context: PostDeployRunContext, log: Logger): Promise<PostDeployOutcome> {
    const actionStart = Date.now();
    const actionLog = log.withContext({ resourceName: action.resourceName });
    const controller = new AbortController();
    const linked = anySignal(this.signal ? [this.signal, controller.signal] : [controller.signal]);
    const signal = linked.signal;

    this.emit({ type: "action:start", resourceName: action.resourceName, message: action.description }, log);
    actionLog.info(`Starting ${action.description}`);

    try {
      const result = await withTimeout(
        action.run({ ...context, log: actionLog, signal }),
        this.actionTimeoutMs,
        () => {
          controller.abort();
          return new DeploymentError(
            action.resourceName,
            `${action.description} timed out after ${this.actionTimeoutMs}ms`,
          );
        },
      );
      const durationMs = Date.now() - actionStart;
      actionLog.info(`${action.description} succeeded in ${durationMs}ms`);
      return {
        resourceName: action.resourceName,
        description: action.description,
        status: "succeeded",
        durationMs,
        detail: result.detail,
      };
    } catch (err) {
      const durationMs = Date.now() - actionStart;
      if (this.signal?.aborted || err instanceof OperationCancelledError) {
        return this.cancelled(action, durationMs, log);
      }
      const error = formatError(err);
      actionLog.error(`${action.description} failed: ${error}`);
      return {
        resourceName: action.resourceName,
        description: action.description,
        status: "failed",
        durationMs,
        error,
      };
    } finally {
      linked.release();
    }
  }

  private cancelled(action: PostDeployAction, durationMs: number, log: Logger): PostDeployOutcome {
    this.emit(
      { type: "action:cancelled", resourceName: action.resourceName, message: `${action.description} was cancelled` },
      log,
    );
    return {
      resourceName: action.resourceName,
      description: action.description,
      status: "cancelled",
      durationMs,
      error: `${action.description} was cancelled`,
    };
  }
}

// =============================================================================
// Utilities
// =============================================================================

function withTimeout<T>(promise: Promise<T>, ms: number, onTimeout: () => Error): Promise<T> {
  if (ms <= 0) return promise;
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(onTimeout()), ms);
    promise
      .then((val) => { clearTimeout(timer); resolve(val); })
      .catch((err: unknown) => { clearTimeout(timer); reject(err); });
  });
}

type LinkedSignal = {
  signal: AbortSignal;
  /** Detach from the source signals. */
  release: () => void;
};

/**
 * Combine multiple AbortSignals; aborts when ANY signal fires.
 */
export function anySignal(signals: readonly AbortSignal[]): LinkedSignal {
  const controller = new AbortController();
  const detach: Array<() => void> = [];
  const release = () => {
    for (const remove of detach.splice(0)) remove();
  };

  for (const signal of signals) {
    if (signal.aborted) {
      release();
      controller.abort(signal.reason);
      return { signal: controller.signal, release };
    }
    const onAbort = () => {
      release();
      controller.abort(signal.reason);
    };
    signal.addEventListener("abort", onAbort, { once: true });
    detach.push(() => signal.removeEventListener("abort", onAbort));
  }
  return { signal: controller.signal, release };
}

// =============================================================================
// Convenience
// =============================================================================

/**
 * Run a post-deploy queue in one call.
 */
export async function runPostDeploy(
  actions: readonly PostDeployAction[],
  context: PostDeployRunContext,
  options?: PostDeployOptions,
  listener?: PostDeployEventListener,
): Promise<PostDeployReport> {
  const runner = new PostDeployRunner(options);
  if (listener) runner.on(listener);
  return runner.run(actions, context);
}
