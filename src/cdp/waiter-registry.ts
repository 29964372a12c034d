import { v4 as uuidv4 } from "uuid";
import { Deferred } from "./deferred";
import { ProtocolError, TimeoutError } from "../error";
import type { ResponseMessage } from "./protocol-message";
import type { EventMatcher } from "./types";

interface CommandWaiter {
  id: number;
  method: string;
  deferred: Deferred<unknown>;
}

/**
 * In-flight commands of one channel (the root connection or a session),
 * keyed by command id. Settling always removes the entry first, so a
 * response racing a close sweep can only ever win once.
 */
export class CommandRegistry {
  private readonly waiters = new Map<number, CommandWaiter>();

  get size(): number {
    return this.waiters.size;
  }

  methodOf(id: number): string | undefined {
    return this.waiters.get(id)?.method;
  }

  register(id: number, method: string): Promise<unknown> {
    if (this.waiters.has(id)) {
      throw new Error(`Command id ${id} is already in flight`);
    }
    const deferred = new Deferred<unknown>();
    this.waiters.set(id, { id, method, deferred });
    return deferred.promise;
  }

  resolve(id: number, result: unknown): boolean {
    const waiter = this.take(id);
    return waiter ? waiter.deferred.resolve(result) : false;
  }

  reject(id: number, error: Error): boolean {
    const waiter = this.take(id);
    return waiter ? waiter.deferred.reject(error) : false;
  }

  /**
   * Resolves or rejects the waiter a response belongs to. Returns false when
   * no waiter with that id is in flight.
   */
  settle(response: ResponseMessage, sessionId: string | null): boolean {
    const method = this.methodOf(response.id);
    if (method === undefined) {
      return false;
    }
    if (response.error) {
      return this.reject(
        response.id,
        new ProtocolError(response.error, { method, sessionId })
      );
    }
    return this.resolve(response.id, response.result);
  }

  /**
   * Empties the registry, then rejects every waiter that was in it. Returns
   * how many waiters were rejected.
   */
  rejectAll(errorFor: (method: string) => Error): number {
    const pending = Array.from(this.waiters.values());
    this.waiters.clear();
    let rejected = 0;
    for (const waiter of pending) {
      if (waiter.deferred.reject(errorFor(waiter.method))) {
        rejected++;
      }
    }
    return rejected;
  }

  private take(id: number): CommandWaiter | undefined {
    const waiter = this.waiters.get(id);
    if (waiter) {
      this.waiters.delete(id);
    }
    return waiter;
  }
}

interface PredicateWaiter {
  id: string;
  method: string;
  /** Returns true once the waiter has been settled by this event. */
  offer(params: unknown): boolean;
  fail(error: Error): boolean;
}

export interface PredicateWaiterOptions<T> {
  method: string;
  matcher: EventMatcher<T>;
  /** `0` disables the deadline. */
  timeoutMs: number;
}

/**
 * Waiters resolved by streaming events through their matchers rather than
 * by correlation id.
 */
export class PredicateWaiterSet {
  private readonly waiters = new Map<string, PredicateWaiter>();

  get size(): number {
    return this.waiters.size;
  }

  add<T>({ method, matcher, timeoutMs }: PredicateWaiterOptions<T>): Promise<T> {
    const id = uuidv4();
    const deferred = new Deferred<T>();
    let timer: NodeJS.Timeout | null = null;

    const finish = (): void => {
      this.waiters.delete(id);
      if (timer) {
        clearTimeout(timer);
        timer = null;
      }
    };

    const waiter: PredicateWaiter = {
      id,
      method,
      offer: (params) => {
        let matched: T | undefined;
        try {
          matched = matcher(params);
        } catch (error) {
          finish();
          return deferred.reject(
            error instanceof Error ? error : new Error(String(error))
          );
        }
        if (matched === undefined) {
          return false;
        }
        finish();
        return deferred.resolve(matched);
      },
      fail: (error) => {
        finish();
        return deferred.reject(error);
      },
    };

    this.waiters.set(id, waiter);

    if (timeoutMs > 0) {
      timer = setTimeout(() => {
        timer = null;
        waiter.fail(new TimeoutError(timeoutMs, method, { method }));
      }, timeoutMs);
    }

    return deferred.promise;
  }

  /**
   * Feeds one event to every waiter registered for its method. A waiter that
   * matches is removed before it resolves and is never offered another event.
   */
  dispatch(method: string, params: unknown): void {
    for (const waiter of Array.from(this.waiters.values())) {
      if (waiter.method !== method || !this.waiters.has(waiter.id)) {
        continue;
      }
      waiter.offer(params);
    }
  }

  rejectAll(errorFor: (method: string) => Error): number {
    const pending = Array.from(this.waiters.values());
    this.waiters.clear();
    let rejected = 0;
    for (const waiter of pending) {
      if (waiter.fail(errorFor(waiter.method))) {
        rejected++;
      }
    }
    return rejected;
  }
}
