import type { Browser } from "./browser";
import { Page } from "./page";
import { CloseGuard } from "../cdp/close-guard";
import type { Connection } from "../cdp/connection";
import { SharedClose } from "../cdp/sync-bridge";
import { CloseReason } from "../cdp/types";
import { CdpMuxError, TargetClosedError } from "../error";

/**
 * A browser context (an isolated profile) and the pages opened in it. The
 * default context has no id and lives as long as the browser.
 */
export class BrowserContext {
  private readonly pagesByTarget = new Map<string, Page>();
  private readonly guard = new CloseGuard("BrowserContext");
  private readonly closing = new SharedClose();

  constructor(
    private readonly owner: Browser,
    readonly id: string | undefined
  ) {}

  get connection(): Connection {
    return this.owner.connection;
  }

  get isDefault(): boolean {
    return this.id === undefined;
  }

  get isClosed(): boolean {
    return this.guard.isClosed;
  }

  get closeReason(): CloseReason | null {
    return this.guard.reason;
  }

  browser(): Browser {
    return this.owner;
  }

  pages(): Page[] {
    return Array.from(this.pagesByTarget.values());
  }

  async newPage(): Promise<Page> {
    this.assertOpen("Target.createTarget");
    const { targetId } = await this.connection.send("Target.createTarget", {
      url: "about:blank",
      browserContextId: this.id,
    });
    const session = await this.connection.createSession(targetId);
    const page = await Page.create(this, session, targetId);
    if (this.guard.isClosed) {
      page.dispose();
      this.assertOpen("Target.createTarget");
    }
    if (!page.isClosed) {
      this.pagesByTarget.set(targetId, page);
    }
    return page;
  }

  /**
   * Disposes the context in the browser, then closes every page still open
   * in it. The default context cannot be closed.
   */
  close(): Promise<void> {
    const browserContextId = this.id;
    if (browserContextId === undefined) {
      return Promise.reject(
        new CdpMuxError("The default browser context cannot be closed")
      );
    }
    return this.closing.run(async () => {
      if (this.guard.isClosed) {
        return;
      }
      try {
        await this.connection.send("Target.disposeBrowserContext", {
          browserContextId,
        });
      } catch (error) {
        if (!(error instanceof TargetClosedError)) {
          throw error;
        }
      }
      this.closeNow(CloseReason.ExplicitClose);
    });
  }

  /** @internal */
  removePage(page: Page): void {
    if (this.pagesByTarget.get(page.targetId) === page) {
      this.pagesByTarget.delete(page.targetId);
    }
  }

  /**
   * Closes every page first, then marks the context closed.
   *
   * @internal
   */
  closeNow(reason: CloseReason): void {
    if (!this.guard.begin(reason)) {
      return;
    }
    for (const page of this.pages()) {
      page.closeFromOwner(reason);
    }
    this.pagesByTarget.clear();
    this.owner.forgetContext(this);
    this.guard.complete();
  }

  private assertOpen(method: string): void {
    const reason = this.guard.reason ?? this.connection.closeReason;
    if (reason !== null) {
      throw new TargetClosedError(reason, { method });
    }
  }
}
