import { BrowserContext } from "./browser-context";
import { BrowserEmitter } from "./events";
import type { Page } from "./page";
import { CloseGuard } from "../cdp/close-guard";
import { Connection } from "../cdp/connection";
import { SharedClose } from "../cdp/sync-bridge";
import { CloseReason } from "../cdp/types";
import { applyDebugSettings } from "../debug/options";
import { TargetClosedError } from "../error";
import { resolveConnectOptions, type ConnectOptions } from "../types/config";
import { logBackgroundFailure } from "../utils/diagnostics";

/**
 * Top of the close cascade. The browser is closed exactly when its
 * connection is: by then every session has rejected its waiters, every page
 * has emitted `close` and every context has been marked closed.
 */
export class Browser extends BrowserEmitter {
  private readonly guard = new CloseGuard("Browser");
  private readonly closing = new SharedClose();
  private readonly defaultBrowserContext: BrowserContext;
  private readonly contextsById = new Map<string, BrowserContext>();

  constructor(readonly connection: Connection) {
    super();
    this.defaultBrowserContext = new BrowserContext(this, undefined);
    connection.onClosed((reason) => this.onConnectionClosed(reason));
    if (connection.closeReason !== null) {
      this.onConnectionClosed(connection.closeReason);
    }
  }

  static async connect(options: ConnectOptions): Promise<Browser> {
    const resolved = resolveConnectOptions(options);
    applyDebugSettings(resolved.debug, resolved.debugOptions);
    const connection = await Connection.connect(resolved.browserWSEndpoint, {
      defaultTimeout: resolved.defaultTimeout,
      maxPayload: resolved.maxPayload,
      handshakeTimeout: resolved.handshakeTimeout,
    });
    return new Browser(connection);
  }

  get isClosed(): boolean {
    return this.guard.isClosed;
  }

  get closeReason(): CloseReason | null {
    return this.guard.reason;
  }

  wsEndpoint(): string {
    return this.connection.url;
  }

  defaultContext(): BrowserContext {
    return this.defaultBrowserContext;
  }

  contexts(): BrowserContext[] {
    return [this.defaultBrowserContext, ...this.contextsById.values()];
  }

  async newContext(): Promise<BrowserContext> {
    const { browserContextId } = await this.connection.send(
      "Target.createBrowserContext",
      { disposeOnDetach: true }
    );
    const context = new BrowserContext(this, browserContextId);
    this.contextsById.set(browserContextId, context);
    return context;
  }

  newPage(): Promise<Page> {
    return this.defaultBrowserContext.newPage();
  }

  pages(): Page[] {
    return this.contexts().flatMap((context) => context.pages());
  }

  /**
   * Asks the browser to shut down, then closes the connection. Resolves once
   * the whole hierarchy is closed; concurrent calls share one close.
   */
  close(): Promise<void> {
    return this.closing.run(async () => {
      if (this.guard.isClosed) {
        return;
      }
      try {
        await this.connection.send("Browser.close");
      } catch (error) {
        if (!(error instanceof TargetClosedError)) {
          throw error;
        }
      } finally {
        await this.connection.close(CloseReason.ExplicitClose);
      }
    });
  }

  /** Closes the connection and leaves the browser process running. */
  disconnect(): Promise<void> {
    return this.connection.close(CloseReason.ExplicitClose);
  }

  /**
   * Synchronous teardown. When this returns `isClosed` is true and every
   * waiter below the browser has been rejected.
   */
  dispose(): void {
    if (this.guard.isClosed) {
      return;
    }
    if (!this.connection.isClosed) {
      this.connection
        .send("Browser.close")
        .catch((error: unknown) =>
          logBackgroundFailure("Browser", "Browser.close", error)
        );
    }
    this.connection.dispose();
  }

  /** @internal */
  forgetContext(context: BrowserContext): void {
    if (context.id !== undefined && this.contextsById.get(context.id) === context) {
      this.contextsById.delete(context.id);
    }
  }

  private onConnectionClosed(reason: CloseReason): void {
    if (!this.guard.begin(reason)) {
      return;
    }
    for (const context of this.contexts()) {
      context.closeNow(reason);
    }
    this.contextsById.clear();
    this.guard.complete();
    this.emit("disconnected", reason);
  }
}
