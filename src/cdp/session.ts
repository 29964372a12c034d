import { CloseGuard } from "./close-guard";
import { EventHandlerMap } from "./event-handlers";
import { encodeOutgoingMessage, type ResponseMessage } from "./protocol-message";
import {
  CloseReason,
  type CDPChannel,
  type CloseHandler,
  type CommandParams,
  type CommandResult,
  type EventHandler,
  type EventMatcher,
  type ProtocolCommand,
  type SessionState,
  type WaitForEventOptions,
} from "./types";
import { CommandRegistry, PredicateWaiterSet } from "./waiter-registry";
import { isDebugEnabled } from "../debug/options";
import { TargetClosedError } from "../error";

/**
 * What a session needs from its connection. The session only uses it to
 * allocate ids and write frames; it never controls the connection's
 * lifetime.
 */
export interface SessionHost {
  readonly closeReason: CloseReason | null;
  readonly defaultTimeout: number;
  nextCommandId(): number;
  writeFrame(frame: string): void;
  forgetSession(sessionId: string): void;
  send<M extends ProtocolCommand>(
    method: M,
    params?: CommandParams<M>
  ): Promise<CommandResult<M>>;
}

export class CdpSession implements CDPChannel {
  private readonly callbacks = new CommandRegistry();
  private readonly predicates = new PredicateWaiterSet();
  private readonly handlers = new EventHandlerMap("CdpSession");
  private readonly guard = new CloseGuard("CdpSession");

  constructor(
    private readonly host: SessionHost,
    readonly id: string,
    readonly targetId: string,
    readonly targetType: string
  ) {}

  get isClosed(): boolean {
    return this.guard.isClosed;
  }

  get closeReason(): CloseReason | null {
    return this.guard.reason;
  }

  get state(): SessionState {
    const reason = this.guard.reason;
    if (reason === null) return "attached";
    return reason === CloseReason.TargetDetached ? "detached" : "closed";
  }

  /** Commands sent on this session that are still waiting for a response. */
  get pendingCommandCount(): number {
    return this.callbacks.size;
  }

  get pendingWaiterCount(): number {
    return this.predicates.size;
  }

  send<M extends ProtocolCommand>(
    method: M,
    params?: CommandParams<M>
  ): Promise<CommandResult<M>> {
    const reason = this.guard.reason ?? this.host.closeReason;
    if (reason !== null) {
      return Promise.reject(
        new TargetClosedError(reason, { method, sessionId: this.id })
      );
    }
    const id = this.host.nextCommandId();
    let frame: string;
    try {
      frame = encodeOutgoingMessage({ id, method, params, sessionId: this.id });
    } catch (error) {
      return Promise.reject(error);
    }
    const result = this.callbacks.register(id, method);
    this.host.writeFrame(frame);
    return result as Promise<CommandResult<M>>;
  }

  on(event: string, handler: EventHandler): void {
    this.handlers.on(event, handler);
  }

  off(event: string, handler: EventHandler): void {
    this.handlers.off(event, handler);
  }

  once(event: string, handler: EventHandler): void {
    this.handlers.once(event, handler);
  }

  /**
   * Resolves with the first `method` event the matcher accepts. Rejects with
   * a TimeoutError when `timeout` elapses first, or a TargetClosedError when
   * the session closes first; whichever happens first wins.
   */
  waitForEvent<T>(
    method: string,
    matcher: EventMatcher<T>,
    options: WaitForEventOptions = {}
  ): Promise<T> {
    const reason = this.guard.reason ?? this.host.closeReason;
    if (reason !== null) {
      return Promise.reject(
        new TargetClosedError(reason, { waitingFor: method, sessionId: this.id })
      );
    }
    return this.predicates.add({
      method,
      matcher,
      timeoutMs: options.timeout ?? this.host.defaultTimeout,
    });
  }

  onClosed(handler: CloseHandler): void {
    this.guard.onClosed(handler);
  }

  offClosed(handler: CloseHandler): void {
    this.guard.offClosed(handler);
  }

  /**
   * Asks the browser to detach this session, then closes it locally with
   * `TargetDetached` whether or not the request went through.
   */
  async detach(): Promise<void> {
    const reason = this.guard.reason;
    if (reason !== null) {
      throw new TargetClosedError(reason, {
        method: "Target.detachFromTarget",
        sessionId: this.id,
      });
    }
    try {
      await this.host.send("Target.detachFromTarget", { sessionId: this.id });
    } finally {
      this.close(CloseReason.TargetDetached);
    }
  }

  /**
   * Idempotent. Rejects every command and waiter of this session with
   * `reason`, stops routing to it and fires close listeners once.
   */
  close(reason: CloseReason = CloseReason.ExplicitClose, cause?: unknown): void {
    if (!this.guard.begin(reason)) {
      return;
    }
    const commands = this.callbacks.rejectAll(
      (method) =>
        new TargetClosedError(reason, { method, sessionId: this.id, cause })
    );
    const waiters = this.predicates.rejectAll(
      (method) =>
        new TargetClosedError(reason, {
          waitingFor: method,
          sessionId: this.id,
          cause,
        })
    );
    this.host.forgetSession(this.id);
    if (isDebugEnabled("closeCascade")) {
      console.debug(
        `[CdpSession] ${this.id} closed (${reason}): rejected ${commands} command(s), ${waiters} waiter(s)`
      );
    }
    this.guard.complete();
    this.handlers.clear();
  }

  /** @internal */
  handleResponse(response: ResponseMessage): void {
    if (!this.callbacks.settle(response, this.id) && isDebugEnabled("cdpFrames")) {
      console.debug(`[CdpSession] ${this.id} has no waiter for response ${response.id}`);
    }
  }

  /**
   * Feeds predicate waiters first, then listeners, so a waiter registered
   * by a listener only sees later events.
   *
   * @internal
   */
  handleEvent(method: string, params: unknown): void {
    if (this.guard.isClosed) {
      return;
    }
    this.predicates.dispatch(method, params);
    this.handlers.emit(method, params);
  }
}
