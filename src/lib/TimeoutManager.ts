/**
 * TimeoutManager - Per-call timeout and cancellation scopes
 *
 * Responsibilities:
 * - Combine the call timeout and the external signal into one AbortSignal
 * - Report which of the two fired (TimeoutError or CancelledError)
 * - Provide abortable sleeps for polling handlers
 * - Cancel every open scope on shutdown
 */

import { setTimeout as delay } from "timers/promises";
import { v4 as uuidv4 } from "uuid";
import { ExecutionScope, ITimeoutManager } from "../interfaces";
import { CancelledError, GatewayError, TimeoutError } from "../types";

interface ScopeRecord {
  controller: AbortController;
  timer: NodeJS.Timeout;
  detach: () => void;
}

/**
 * Error a signal was aborted with, as a gateway error
 */
export function abortReason(signal: AbortSignal): GatewayError {
  const reason: unknown = signal.reason;
  if (reason instanceof TimeoutError || reason instanceof CancelledError) {
    return reason;
  }
  return new CancelledError();
}

/**
 * TimeoutManager implementation
 */
export class TimeoutManager implements ITimeoutManager {
  private scopes: Map<string, ScopeRecord> = new Map();
  private defaultTimeoutMs: number;

  /**
   * Create a new TimeoutManager
   * @param defaultTimeoutMs Timeout used when a call passes 0 or less (default: 30 seconds)
   */
  constructor(defaultTimeoutMs: number = 30000) {
    this.defaultTimeoutMs = defaultTimeoutMs;
  }

  begin(timeoutMs: number, signal?: AbortSignal): ExecutionScope {
    const effectiveTimeout =
      Number.isFinite(timeoutMs) && timeoutMs > 0
        ? timeoutMs
        : this.defaultTimeoutMs;
    const callId = uuidv4();
    const controller = new AbortController();

    const timer = setTimeout(() => {
      controller.abort(new TimeoutError(effectiveTimeout));
    }, effectiveTimeout);

    const onExternalAbort = () => controller.abort(new CancelledError());
    if (signal?.aborted) {
      onExternalAbort();
    } else {
      signal?.addEventListener("abort", onExternalAbort, { once: true });
    }

    const record: ScopeRecord = {
      controller,
      timer,
      detach: () => signal?.removeEventListener("abort", onExternalAbort),
    };
    this.scopes.set(callId, record);

    const scopeSignal = controller.signal;

    return {
      callId,
      signal: scopeSignal,
      throwIfAborted: () => {
        if (scopeSignal.aborted) {
          throw abortReason(scopeSignal);
        }
      },
      sleep: async (ms: number) => {
        try {
          await delay(ms, undefined, { signal: scopeSignal });
        } catch (error) {
          if (scopeSignal.aborted) {
            throw abortReason(scopeSignal);
          }
          throw error;
        }
      },
      race: <T>(work: Promise<T>) =>
        new Promise<T>((resolve, reject) => {
          const onAbort = () => reject(abortReason(scopeSignal));
          if (scopeSignal.aborted) {
            onAbort();
          } else {
            scopeSignal.addEventListener("abort", onAbort, { once: true });
          }
          work.then(
            (value) => {
              scopeSignal.removeEventListener("abort", onAbort);
              resolve(value);
            },
            (error: unknown) => {
              scopeSignal.removeEventListener("abort", onAbort);
              if (scopeSignal.aborted && !(error instanceof GatewayError)) {
                console.error(
                  `[TimeoutManager] Call ${callId} failed after it was aborted:`,
                  error
                );
              }
              reject(error);
            }
          );
        }),
      dispose: () => this.release(callId),
    };
  }

  cancelAll(reason: string = "Gateway is shutting down"): void {
    for (const record of this.scopes.values()) {
      record.controller.abort(new CancelledError(reason));
    }
  }

  activeCount(): number {
    return this.scopes.size;
  }

  clearAll(): void {
    for (const callId of Array.from(this.scopes.keys())) {
      this.release(callId);
    }
  }

  private release(callId: string): void {
    const record = this.scopes.get(callId);
    if (record) {
      clearTimeout(record.timer);
      record.detach();
      this.scopes.delete(callId);
    }
  }
}
