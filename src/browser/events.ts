import EventEmitter from "events";
import type { CloseReason } from "../cdp/types";

type PageEvents = {
  /**
   * Emitted once, after the page's session has rejected its waiters.
   */
  close: (reason: CloseReason) => void;
};

type BrowserEvents = {
  /**
   * Emitted once when the browser's connection closes, after every page and
   * context below it has been marked closed.
   */
  disconnected: (reason: CloseReason) => void;
};

export class PageEmitter extends EventEmitter {
  override on<K extends keyof PageEvents>(
    event: K,
    listener: PageEvents[K]
  ): this {
    return super.on(event, listener);
  }

  override once<K extends keyof PageEvents>(
    event: K,
    listener: PageEvents[K]
  ): this {
    return super.once(event, listener);
  }

  override off<K extends keyof PageEvents>(
    event: K,
    listener: PageEvents[K]
  ): this {
    return super.off(event, listener);
  }

  override emit<K extends keyof PageEvents>(
    event: K,
    ...args: Parameters<PageEvents[K]>
  ): boolean {
    return super.emit(event, ...args);
  }
}

export class BrowserEmitter extends EventEmitter {
  override on<K extends keyof BrowserEvents>(
    event: K,
    listener: BrowserEvents[K]
  ): this {
    return super.on(event, listener);
  }

  override once<K extends keyof BrowserEvents>(
    event: K,
    listener: BrowserEvents[K]
  ): this {
    return super.once(event, listener);
  }

  override off<K extends keyof BrowserEvents>(
    event: K,
    listener: BrowserEvents[K]
  ): this {
    return super.off(event, listener);
  }

  override emit<K extends keyof BrowserEvents>(
    event: K,
    ...args: Parameters<BrowserEvents[K]>
  ): boolean {
    return super.emit(event, ...args);
  }
}
