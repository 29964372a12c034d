import { CloseGuard } from "./close-guard";
import { EventHandlerMap } from "./event-handlers";
import {
  AttachedToTargetParamsSchema,
  DetachedFromTargetParamsSchema,
  encodeOutgoingMessage,
  parseInboundFrame,
  type EventMessage,
  type InboundMessage,
  type ResponseMessage,
} from "./protocol-message";
import { CdpSession, type SessionHost } from "./session";
import {
  WebSocketTransport,
  type ConnectionTransport,
  type WebSocketTransportOptions,
} from "./transport";
import {
  CloseReason,
  type CDPChannel,
  type CloseHandler,
  type CommandParams,
  type CommandResult,
  type EventHandler,
  type EventMatcher,
  type ProtocolCommand,
  type WaitForEventOptions,
} from "./types";
import { CommandRegistry, PredicateWaiterSet } from "./waiter-registry";
import { isDebugEnabled } from "../debug/options";
import {
  TargetClosedError,
  TransportClosedFault,
  TransportFault,
} from "../error";
import {
  resolveConnectionOptions,
  type ConnectionOptions,
} from "../types/config";
import { formatDiagnostic } from "../utils/diagnostics";

/**
 * One control connection to a remote debugging endpoint, multiplexing
 * flattened per-target sessions.
 *
 * Inbound frames are queued and dispatched strictly one at a time in
 * transport order: a frame is fully routed (waiters settled, listeners run)
 * before the next one is looked at, even when a listener causes another
 * frame to be delivered re-entrantly.
 *
 * @example
 * ```typescript
 * const connection = await Connection.connect("ws://127.0.0.1:9222/devtools/browser/abc");
 * const session = await connection.createSession(targetId);
 * await session.send("Runtime.enable");
 * await connection.close();
 * ```
 */
export class Connection implements CDPChannel, SessionHost {
  readonly defaultTimeout: number;
  private nextId = 1;
  private readonly callbacks = new CommandRegistry();
  private readonly predicates = new PredicateWaiterSet();
  private readonly handlers = new EventHandlerMap("Connection");
  private readonly sessions = new Map<string, CdpSession>();
  private readonly guard = new CloseGuard("Connection");
  private readonly inbound: string[] = [];
  private draining = false;
  private pendingAttaches = 0;
  private readonly detachedDuringAttach = new Set<string>();
  private transportRelease: Promise<void> | null = null;

  constructor(
    private readonly transport: ConnectionTransport,
    options: ConnectionOptions = {},
    readonly url: string = ""
  ) {
    this.defaultTimeout = resolveConnectionOptions(options).defaultTimeout;
    transport.listen({
      onFrame: (frame) => this.onFrame(frame),
      onClosed: (why) => this.onTransportClosed(why),
      onError: (error) => this.onTransportError(error),
    });
  }

  static async connect(
    url: string,
    options: ConnectionOptions & WebSocketTransportOptions = {}
  ): Promise<Connection> {
    const { maxPayload, handshakeTimeout, ...connectionOptions } = options;
    const transport = await WebSocketTransport.connect(url, {
      maxPayload,
      handshakeTimeout,
    });
    return new Connection(transport, connectionOptions, url);
  }

  get isClosed(): boolean {
    return this.guard.isClosed;
  }

  get closeReason(): CloseReason | null {
    return this.guard.reason;
  }

  /** Number of root-level commands still waiting for a response. */
  get pendingCommandCount(): number {
    return this.callbacks.size;
  }

  send<M extends ProtocolCommand>(
    method: M,
    params?: CommandParams<M>
  ): Promise<CommandResult<M>> {
    const reason = this.guard.reason;
    if (reason !== null) {
      return Promise.reject(
        new TargetClosedError(reason, { method, sessionId: null })
      );
    }
    const id = this.nextCommandId();
    let frame: string;
    try {
      frame = encodeOutgoingMessage({ id, method, params });
    } catch (error) {
      return Promise.reject(error);
    }
    const result = this.callbacks.register(id, method);
    this.writeFrame(frame);
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
   * Waits for a root-level event (one that carries no session id).
   */
  waitForEvent<T>(
    method: string,
    matcher: EventMatcher<T>,
    options: WaitForEventOptions = {}
  ): Promise<T> {
    const reason = this.guard.reason;
    if (reason !== null) {
      return Promise.reject(new TargetClosedError(reason, { waitingFor: method }));
    }
    return this.predicates.add({
      method,
      matcher,
      timeoutMs: options.timeout ?? this.defaultTimeout,
    });
  }

  onClosed(handler: CloseHandler): void {
    this.guard.onClosed(handler);
  }

  offClosed(handler: CloseHandler): void {
    this.guard.offClosed(handler);
  }

  session(sessionId: string): CdpSession | undefined {
    return this.sessions.get(sessionId);
  }

  activeSessions(): CdpSession[] {
    return Array.from(this.sessions.values());
  }

  /**
   * Attaches to a target in flat mode and returns its session. Rejects with
   * `TargetDetached` when the new session detaches before the attach
   * response arrives.
   */
  async createSession(targetId: string): Promise<CdpSession> {
    this.pendingAttaches++;
    let sessionId: string;
    try {
      ({ sessionId } = await this.send("Target.attachToTarget", {
        targetId,
        flatten: true,
      }));
    } finally {
      this.pendingAttaches--;
    }
    const detached = this.detachedDuringAttach.delete(sessionId);
    if (this.pendingAttaches === 0) {
      this.detachedDuringAttach.clear();
    }
    const reason = this.guard.reason;
    if (reason !== null) {
      throw new TargetClosedError(reason, { method: "Target.attachToTarget" });
    }
    if (detached) {
      throw new TargetClosedError(CloseReason.TargetDetached, {
        method: "Target.attachToTarget",
        sessionId,
      });
    }
    return this.adoptSession(sessionId, targetId, "page");
  }

  /**
   * Closes the connection and everything multiplexed over it. Idempotent:
   * every call returns once the first close has released the transport.
   */
  async close(reason: CloseReason = CloseReason.ExplicitClose): Promise<void> {
    this.closeNow(reason);
    await this.releaseTransport();
  }

  /**
   * Synchronous teardown. When this returns, `isClosed` is true and every
   * waiter has been rejected; only the transport release continues in the
   * background.
   */
  dispose(): void {
    this.closeNow(CloseReason.ExplicitClose);
    void this.releaseTransport();
  }

  /** @internal */
  nextCommandId(): number {
    return this.nextId++;
  }

  /**
   * Writes one encoded frame. Writes happen synchronously on the caller's
   * turn, so frames from concurrent callers never interleave.
   *
   * @internal
   */
  writeFrame(frame: string): void {
    if (isDebugEnabled("cdpFrames")) {
      console.debug(`[Connection] SEND ► ${frame}`);
    }
    try {
      this.transport.writeFrame(frame);
    } catch (error) {
      if (error instanceof TransportClosedFault) {
        this.closeNow(CloseReason.TransportClosed, error);
        void this.releaseTransport();
        return;
      }
      this.onTransportError(
        error instanceof Error ? error : new TransportFault(formatDiagnostic(error))
      );
    }
  }

  /** @internal */
  forgetSession(sessionId: string): void {
    this.sessions.delete(sessionId);
  }

  private adoptSession(
    sessionId: string,
    targetId: string,
    targetType: string
  ): CdpSession {
    let session = this.sessions.get(sessionId);
    if (!session) {
      session = new CdpSession(this, sessionId, targetId, targetType);
      this.sessions.set(sessionId, session);
    }
    return session;
  }

  private onFrame(frame: string): void {
    this.inbound.push(frame);
    if (this.draining) {
      return;
    }
    this.draining = true;
    try {
      let next = this.inbound.shift();
      while (next !== undefined) {
        this.dispatchFrame(next);
        next = this.inbound.shift();
      }
    } finally {
      this.draining = false;
    }
  }

  private dispatchFrame(frame: string): void {
    if (this.guard.isClosed) {
      if (isDebugEnabled("cdpFrames")) {
        console.debug(`[Connection] discarding frame after close: ${formatDiagnostic(frame)}`);
      }
      return;
    }
    if (isDebugEnabled("cdpFrames")) {
      console.debug(`[Connection] ◀ RECV ${frame}`);
    }

    let message: InboundMessage;
    try {
      message = parseInboundFrame(frame);
    } catch (error) {
      console.warn(`[Connection] Dropping malformed frame: ${formatDiagnostic(error)}`);
      return;
    }

    if (message.kind === "response") {
      this.routeResponse(message.message);
    } else {
      this.routeEvent(message.message);
    }
  }

  private routeResponse(response: ResponseMessage): void {
    if (response.sessionId) {
      const session = this.sessions.get(response.sessionId);
      if (!session) {
        this.traceDiscard(`response ${response.id}`, response.sessionId);
        return;
      }
      session.handleResponse(response);
      return;
    }
    if (!this.callbacks.settle(response, null) && isDebugEnabled("cdpFrames")) {
      console.debug(`[Connection] no waiter for response ${response.id}`);
    }
  }

  private routeEvent(event: EventMessage): void {
    if (event.method === "Target.attachedToTarget") {
      const attached = AttachedToTargetParamsSchema.safeParse(event.params);
      if (attached.success) {
        this.adoptSession(
          attached.data.sessionId,
          attached.data.targetInfo.targetId,
          attached.data.targetInfo.type
        );
      } else {
        console.warn(
          `[Connection] Ignoring malformed Target.attachedToTarget: ${formatDiagnostic(attached.error.issues)}`
        );
      }
    } else if (event.method === "Target.detachedFromTarget") {
      const detached = DetachedFromTargetParamsSchema.safeParse(event.params);
      if (detached.success) {
        if (this.pendingAttaches > 0) {
          this.detachedDuringAttach.add(detached.data.sessionId);
        }
        this.sessions
          .get(detached.data.sessionId)
          ?.close(CloseReason.TargetDetached);
      }
    }

    if (event.sessionId) {
      const session = this.sessions.get(event.sessionId);
      if (!session) {
        this.traceDiscard(event.method, event.sessionId);
        return;
      }
      session.handleEvent(event.method, event.params);
      return;
    }

    this.predicates.dispatch(event.method, event.params);
    this.handlers.emit(event.method, event.params);
  }

  private traceDiscard(what: string, sessionId: string): void {
    if (isDebugEnabled("cdpFrames")) {
      console.debug(`[Connection] discarding ${what} for unknown or closed session ${sessionId}`);
    }
  }

  /**
   * The synchronous part of every close: flip the flag, reject root
   * waiters, close every session with the same reason, notify listeners.
   * Returns false when an earlier close already ran.
   */
  private closeNow(reason: CloseReason, cause?: unknown): boolean {
    if (!this.guard.begin(reason)) {
      return false;
    }
    const commands = this.callbacks.rejectAll(
      (method) => new TargetClosedError(reason, { method, sessionId: null, cause })
    );
    const waiters = this.predicates.rejectAll(
      (method) => new TargetClosedError(reason, { waitingFor: method, cause })
    );
    const sessions = Array.from(this.sessions.values());
    for (const session of sessions) {
      session.close(reason, cause);
    }
    this.sessions.clear();
    this.detachedDuringAttach.clear();
    this.inbound.length = 0;
    if (isDebugEnabled("closeCascade")) {
      console.debug(
        `[Connection] closed (${reason}): rejected ${commands} command(s), ${waiters} waiter(s), closed ${sessions.length} session(s)`
      );
    }
    this.guard.complete();
    this.handlers.clear();
    return true;
  }

  private releaseTransport(): Promise<void> {
    if (!this.transportRelease) {
      this.transportRelease = this.transport.close().catch((error: unknown) => {
        console.warn(`[Connection] Failed to close transport: ${formatDiagnostic(error)}`);
      });
    }
    return this.transportRelease;
  }

  private onTransportClosed(why: string): void {
    if (!this.transportRelease) {
      this.transportRelease = Promise.resolve();
    }
    this.closeNow(CloseReason.TransportClosed, new TransportFault(why));
  }

  private onTransportError(error: Error): void {
    if (this.guard.isClosed) {
      return;
    }
    console.warn(`[Connection] Transport error: ${formatDiagnostic(error)}`);
    const fault =
      error instanceof TransportFault
        ? error
        : new TransportFault(formatDiagnostic(error), { cause: error });
    this.closeNow(CloseReason.TransportError, fault);
    void this.releaseTransport();
  }
}

export default Connection;
