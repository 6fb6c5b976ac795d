/**
 * ITimeoutManager - Interface for per-call timeout and cancellation scopes
 *
 * Responsibilities:
 * - Combine a call timeout with an external cancellation signal
 * - Offer abortable waits to handlers
 * - Track open scopes so they can be cancelled on shutdown
 */

/**
 * What a tool handler sees of its call
 */
export interface ExecutionContext {
  /** Identifier of the call, used in audit records */
  readonly callId: string;
  /** Aborted when the call times out or is cancelled */
  readonly signal: AbortSignal;
  /**
   * Throw TimeoutError or CancelledError if the call was aborted
   */
  throwIfAborted(): void;
  /**
   * Wait, rejecting with TimeoutError or CancelledError on abort
   */
  sleep(ms: number): Promise<void>;
}

/**
 * An open call scope, owned by the dispatcher
 */
export interface ExecutionScope extends ExecutionContext {
  /**
   * Settle with the work, or reject with the abort reason as soon as the
   * scope is aborted, whichever comes first
   */
  race<T>(work: Promise<T>): Promise<T>;
  /**
   * Release the timer and the external signal listener
   */
  dispose(): void;
}

export interface ITimeoutManager {
  /**
   * Open a scope for one call
   * @param timeoutMs Timeout in milliseconds
   * @param signal External cancellation signal
   */
  begin(timeoutMs: number, signal?: AbortSignal): ExecutionScope;

  /**
   * Cancel every open scope
   */
  cancelAll(reason?: string): void;

  /**
   * Number of open scopes
   */
  activeCount(): number;

  /**
   * Dispose every open scope without aborting it
   */
  clearAll(): void;
}
