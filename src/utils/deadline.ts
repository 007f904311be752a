import { DeadlineExceededError } from '../core/errors.js';

/**
 * Cancellable scope with an absolute deadline.
 * Children never outlive their parent: aborting the parent aborts every child.
 */
export class DeadlineScope {
  private readonly controller = new AbortController();
  private readonly timer: NodeJS.Timeout;
  private readonly detachFromParent: () => void;
  readonly deadline: number;

  constructor(timeoutMs: number, parent?: DeadlineScope) {
    const requested = Date.now() + Math.max(0, timeoutMs);
    this.deadline = parent ? Math.min(requested, parent.deadline) : requested;

    this.timer = setTimeout(
      () => this.abort(new DeadlineExceededError(`deadline of ${timeoutMs}ms exceeded`)),
      this.deadline - Date.now()
    );

    if (parent) {
      const onParentAbort = () => this.abort(parent.signal.reason);
      this.detachFromParent = () => parent.signal.removeEventListener('abort', onParentAbort);
      if (parent.signal.aborted) {
        onParentAbort();
      } else {
        parent.signal.addEventListener('abort', onParentAbort, { once: true });
      }
    } else {
      this.detachFromParent = () => undefined;
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  remainingMs(): number {
    return Math.max(0, this.deadline - Date.now());
  }

  /**
   * Child scope bounded by both `timeoutMs` and this scope's deadline
   */
  child(timeoutMs: number): DeadlineScope {
    return new DeadlineScope(timeoutMs, this);
  }

  abort(reason?: unknown): void {
    if (!this.controller.signal.aborted) {
      this.controller.abort(reason);
    }
    this.dispose();
  }

  /**
   * Release the timer and parent listener without aborting
   */
  dispose(): void {
    clearTimeout(this.timer);
    this.detachFromParent();
  }

  /**
   * Settle with `task`, or reject with the abort reason as soon as the scope is aborted
   */
  run<T>(task: (signal: AbortSignal) => Promise<T>): Promise<T> {
    return raceAbort(task(this.signal), this.signal);
  }
}

/**
 * Title sub-deadline: min(cap, remaining - margin), or the margin itself
 * when nothing positive is left
 */
export function adaptiveBudget(remainingMs: number, capMs: number, safetyMarginMs: number): number {
  const budget = remainingMs - safetyMarginMs;
  if (budget >= capMs) {
    return capMs;
  }
  return budget > 0 ? budget : safetyMarginMs;
}

export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    // The task keeps running; observe it so a later rejection is not unhandled
    promise.catch(() => undefined);
    return Promise.reject(signal.reason);
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}
