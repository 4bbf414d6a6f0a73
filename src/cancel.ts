/**
 * Cooperative cancellation for sync runs.
 *
 * Cancelling never interrupts a remote call already in flight; the engine
 * checks the token before dispatching each operation and each retry, and
 * backoff waits end early through `onCancel`.
 */

import { SyncCancelledError } from './errors.js';

export class CancelToken {
  private _cancelled: boolean = false;
  private _reason: string | null = null;
  private readonly _listeners: Set<() => void> = new Set();

  get isCancelled(): boolean {
    return this._cancelled;
  }

  get reason(): string | null {
    return this._reason;
  }

  cancel(reason?: string): void {
    if (this._cancelled) return;
    this._cancelled = true;
    this._reason = reason ?? null;
    const listeners = [...this._listeners];
    this._listeners.clear();
    for (const listener of listeners) listener();
  }

  /**
   * Call `listener` once when the token is cancelled, or right away if it
   * already is. Returns a function that unregisters it.
   */
  onCancel(listener: () => void): () => void {
    if (this._cancelled) {
      listener();
      return () => undefined;
    }
    this._listeners.add(listener);
    return () => {
      this._listeners.delete(listener);
    };
  }

  check(): void {
    if (this._cancelled) {
      throw new SyncCancelledError(this._reason ?? undefined);
    }
  }

  reset(): void {
    this._cancelled = false;
    this._reason = null;
  }
}
