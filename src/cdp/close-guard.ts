import { Deferred } from "./deferred";
import { formatDiagnostic } from "../utils/diagnostics";
import type { CloseHandler, CloseReason } from "./types";

/**
 * Single-fire close flag for one node of the connection → session → page →
 * context → browser hierarchy. The first reason wins; the flag flips
 * synchronously, before any draining, so every later check observes it.
 */
export class CloseGuard {
  private reasonValue: CloseReason | null = null;
  private readonly completion = new Deferred<CloseReason>();
  private readonly handlers = new Set<CloseHandler>();

  constructor(private readonly tag: string) {}

  get isClosed(): boolean {
    return this.reasonValue !== null;
  }

  get reason(): CloseReason | null {
    return this.reasonValue;
  }

  get isComplete(): boolean {
    return this.completion.settled;
  }

  /**
   * Returns true for the caller that performed the transition; every other
   * caller gets false and must not repeat the close work.
   */
  begin(reason: CloseReason): boolean {
    if (this.reasonValue !== null) {
      return false;
    }
    this.reasonValue = reason;
    return true;
  }

  /**
   * Notifies close handlers (once) and releases everyone waiting on
   * {@link whenComplete}.
   */
  complete(): void {
    const reason = this.reasonValue;
    if (reason === null || this.completion.settled) {
      return;
    }
    const handlers = Array.from(this.handlers);
    this.handlers.clear();
    for (const handler of handlers) {
      try {
        handler(reason);
      } catch (error) {
        console.error(`[${this.tag}] close handler error: ${formatDiagnostic(error)}`);
      }
    }
    this.completion.resolve(reason);
  }

  whenComplete(): Promise<CloseReason> {
    return this.completion.promise;
  }

  onClosed(handler: CloseHandler): void {
    if (this.completion.settled) {
      return;
    }
    this.handlers.add(handler);
  }

  offClosed(handler: CloseHandler): void {
    this.handlers.delete(handler);
  }
}
