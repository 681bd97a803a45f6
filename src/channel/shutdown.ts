/**
 * STL Relay: Shutdown Context
 *
 * One-shot cleanup latch handed to the Channel Server at construction.
 * Components register release actions with `onClose()`; the first `close()`
 * aborts `signal` and runs them newest first. Later calls do nothing.
 *
 * Actions must be synchronous so they can also run from a process 'exit'
 * listener.
 */

import { createLogger } from '../shared/logger.js';

const log = createLogger('shutdown');

export type CleanupAction = () => void;

interface RegisteredAction {
  label: string;
  action: CleanupAction;
}

export class ShutdownContext {
  private readonly controller = new AbortController();
  private readonly actions: RegisteredAction[] = [];
  private closed = false;

  /** Aborted once `close()` starts. */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Register a release action. After shutdown the action runs right away,
   * so a resource opened late is still released.
   */
  onClose(label: string, action: CleanupAction): void {
    if (this.closed) {
      this.run({ label, action });
      return;
    }
    this.actions.push({ label, action });
  }

  /**
   * Run every registered action once. Returns false when cleanup already ran.
   */
  close(reason = 'shutdown'): boolean {
    if (this.closed) return false;
    this.closed = true;

    log.info(`Cleaning up (${reason})`);
    this.controller.abort(reason);

    while (this.actions.length > 0) {
      const next = this.actions.pop();
      if (next) this.run(next);
    }
    return true;
  }

  private run({ label, action }: RegisteredAction): void {
    try {
      action();
    } catch (err) {
      log.warn(`Cleanup step "${label}" failed:`, err);
    }
  }
}
