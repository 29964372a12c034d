import { formatDiagnostic } from "../utils/diagnostics";
import type { EventHandler } from "./types";

/**
 * Listener table for one channel. A handler that throws is logged and does
 * not stop delivery to the handlers after it.
 */
export class EventHandlerMap {
  private readonly handlers = new Map<string, Set<EventHandler>>();
  private readonly onceHandlers = new Map<string, Set<EventHandler>>();

  constructor(private readonly tag: string) {}

  on(event: string, handler: EventHandler): void {
    const set = this.handlers.get(event) ?? new Set<EventHandler>();
    set.add(handler);
    this.handlers.set(event, set);
  }

  once(event: string, handler: EventHandler): void {
    const set = this.onceHandlers.get(event) ?? new Set<EventHandler>();
    set.add(handler);
    this.onceHandlers.set(event, set);
  }

  off(event: string, handler: EventHandler): void {
    for (const table of [this.handlers, this.onceHandlers]) {
      const set = table.get(event);
      if (set) {
        set.delete(handler);
        if (set.size === 0) {
          table.delete(event);
        }
      }
    }
  }

  listenerCount(event: string): number {
    return (
      (this.handlers.get(event)?.size ?? 0) +
      (this.onceHandlers.get(event)?.size ?? 0)
    );
  }

  emit(event: string, params: unknown): void {
    const persistent = this.handlers.get(event);
    const oneShot = this.onceHandlers.get(event);
    if (oneShot) {
      this.onceHandlers.delete(event);
    }
    const targets = [
      ...(persistent ? Array.from(persistent) : []),
      ...(oneShot ? Array.from(oneShot) : []),
    ];
    for (const handler of targets) {
      try {
        handler(params);
      } catch (error) {
        console.error(
          `[${this.tag}] handler error for ${event}: ${formatDiagnostic(error)}`
        );
      }
    }
  }

  clear(): void {
    this.handlers.clear();
    this.onceHandlers.clear();
  }
}
