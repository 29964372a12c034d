import type { Protocol } from "devtools-protocol";
import type { BrowserContext } from "./browser-context";
import { PageEmitter } from "./events";
import {
  requestMatcher,
  responseMatcher,
  type NetworkRequest,
  type NetworkResponse,
  type UrlOrPredicate,
} from "./network";
import { CloseGuard } from "../cdp/close-guard";
import type { CdpSession } from "../cdp/session";
import { SharedClose, scheduleDetached } from "../cdp/sync-bridge";
import {
  CloseReason,
  type CommandParams,
  type CommandResult,
  type ProtocolCommand,
  type WaitForEventOptions,
} from "../cdp/types";
import { CdpMuxError, TargetClosedError } from "../error";
import { logBackgroundFailure } from "../utils/diagnostics";

export interface PageCloseOptions {
  /**
   * Let the page run its `beforeunload` handlers. `close()` then resolves
   * as soon as the request is sent; the page closes once the handlers allow
   * it.
   */
  runBeforeUnload?: boolean;
}

/**
 * One attached page target. Its lifetime follows its session: when the
 * session closes for any reason, the page is closed with the same reason.
 */
export class Page extends PageEmitter {
  private readonly guard = new CloseGuard("Page");
  private readonly closing = new SharedClose();

  private constructor(
    private readonly owner: BrowserContext,
    readonly session: CdpSession,
    readonly targetId: string
  ) {
    super();
    session.onClosed((reason) => this.onSessionClosed(reason));
    if (session.closeReason !== null) {
      this.onSessionClosed(session.closeReason);
    }
  }

  /** @internal */
  static async create(
    owner: BrowserContext,
    session: CdpSession,
    targetId: string
  ): Promise<Page> {
    const page = new Page(owner, session, targetId);
    await Promise.all([
      session.send("Page.enable"),
      session.send("Network.enable"),
    ]);
    return page;
  }

  get isClosed(): boolean {
    return this.guard.isClosed;
  }

  get closeReason(): CloseReason | null {
    return this.guard.reason;
  }

  browserContext(): BrowserContext {
    return this.owner;
  }

  send<M extends ProtocolCommand>(
    method: M,
    params?: CommandParams<M>
  ): Promise<CommandResult<M>> {
    return this.session.send(method, params);
  }

  /**
   * Evaluates `expression` in the page, awaiting it if it is a promise, and
   * returns the value serialized by the browser.
   */
  async evaluate(expression: string): Promise<unknown> {
    const { result, exceptionDetails } = await this.session.send(
      "Runtime.evaluate",
      {
        expression,
        awaitPromise: true,
        returnByValue: true,
      }
    );
    if (exceptionDetails) {
      throw new CdpMuxError(
        `Evaluation failed: ${describeException(exceptionDetails)}`,
        { method: "Runtime.evaluate", sessionId: this.session.id }
      );
    }
    return result.value;
  }

  waitForRequest(
    urlOrPredicate: UrlOrPredicate<NetworkRequest>,
    options: WaitForEventOptions = {}
  ): Promise<NetworkRequest> {
    return this.session.waitForEvent(
      "Network.requestWillBeSent",
      requestMatcher(urlOrPredicate),
      options
    );
  }

  waitForResponse(
    urlOrPredicate: UrlOrPredicate<NetworkResponse>,
    options: WaitForEventOptions = {}
  ): Promise<NetworkResponse> {
    return this.session.waitForEvent(
      "Network.responseReceived",
      responseMatcher(urlOrPredicate),
      options
    );
  }

  /**
   * Closes the target and resolves once its session has detached and every
   * waiter on it has been rejected. Safe to call repeatedly, and resolves
   * immediately when the connection is already gone.
   */
  close(options: PageCloseOptions = {}): Promise<void> {
    if (options.runBeforeUnload) {
      return scheduleDetached(() => this.requestUnloadClose());
    }
    return this.closing.run(() => this.closeTarget());
  }

  /**
   * Synchronous teardown: when this returns the page is closed locally and
   * its waiters are rejected. The browser is asked to close the target in
   * the background.
   */
  dispose(): void {
    if (this.guard.isClosed) {
      return;
    }
    const connection = this.owner.connection;
    if (!connection.isClosed) {
      connection
        .send("Target.closeTarget", { targetId: this.targetId })
        .catch((error: unknown) =>
          logBackgroundFailure("Page", "Target.closeTarget", error)
        );
    }
    this.session.close(CloseReason.ExplicitClose);
  }

  /** @internal */
  closeFromOwner(reason: CloseReason): void {
    this.session.close(reason);
  }

  private async closeTarget(): Promise<void> {
    if (this.guard.isClosed) {
      return;
    }
    try {
      const { success } = await this.owner.connection.send(
        "Target.closeTarget",
        { targetId: this.targetId }
      );
      if (!success && !this.guard.isClosed) {
        throw new CdpMuxError(`Target ${this.targetId} refused to close`, {
          method: "Target.closeTarget",
        });
      }
    } catch (error) {
      if (error instanceof TargetClosedError && this.guard.isClosed) {
        return;
      }
      throw error;
    }
    await this.guard.whenComplete();
  }

  private async requestUnloadClose(): Promise<void> {
    if (this.guard.isClosed) {
      return;
    }
    try {
      await this.session.send("Page.close");
    } catch (error) {
      if (error instanceof TargetClosedError && this.guard.isClosed) {
        return;
      }
      throw error;
    }
  }

  private onSessionClosed(reason: CloseReason): void {
    if (!this.guard.begin(reason)) {
      return;
    }
    this.owner.removePage(this);
    this.guard.complete();
    this.emit("close", reason);
  }
}

function describeException(
  details: Protocol.Runtime.ExceptionDetails
): string {
  return details.exception?.description ?? details.text;
}
