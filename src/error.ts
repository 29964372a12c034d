import type { CloseReason } from "./cdp/types";

export interface CdpMuxErrorContext {
  method?: string;
  sessionId?: string | null;
  cause?: unknown;
}

export class CdpMuxError extends Error {
  public readonly method?: string;
  public readonly sessionId?: string | null;

  constructor(message: string, context: CdpMuxErrorContext = {}) {
    super(message, { cause: context.cause });
    this.name = "CdpMuxError";
    this.method = context.method;
    this.sessionId = context.sessionId;
  }
}

export interface ProtocolErrorPayload {
  code: number;
  message: string;
  data?: unknown;
}

/**
 * The remote end answered a command with an error payload.
 * Only the caller of that command ever sees it.
 */
export class ProtocolError extends CdpMuxError {
  public readonly code: number;
  public readonly data?: unknown;

  constructor(
    payload: ProtocolErrorPayload,
    context: Omit<CdpMuxErrorContext, "cause"> = {}
  ) {
    const prefix = context.method
      ? `Protocol error (${context.method})`
      : "Protocol error";
    super(`${prefix}: ${payload.message}`, context);
    this.name = "ProtocolError";
    this.code = payload.code;
    this.data = payload.data;
  }
}

/**
 * A command or wait was cut short because the session, connection or one of
 * their owners closed. `closeReason` tells an intentional close apart from a
 * detached target or a transport failure.
 */
export class TargetClosedError extends CdpMuxError {
  public readonly closeReason: CloseReason;

  constructor(
    closeReason: CloseReason,
    context: CdpMuxErrorContext & { waitingFor?: string } = {}
  ) {
    const { waitingFor, ...rest } = context;
    super(TargetClosedError.describe(closeReason, rest.method, waitingFor), rest);
    this.name = "TargetClosedError";
    this.closeReason = closeReason;
  }

  private static describe(
    closeReason: CloseReason,
    method?: string,
    waitingFor?: string
  ): string {
    if (waitingFor) {
      return `Waiting for ${waitingFor} failed: Target closed. (${closeReason})`;
    }
    const prefix = method ? `Protocol error (${method})` : "Protocol error";
    return `${prefix}: Target closed. (${closeReason})`;
  }
}

export class TimeoutError extends CdpMuxError {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number, waitingFor: string, context: CdpMuxErrorContext = {}) {
    super(
      `Timeout of ${timeoutMs}ms exceeded while waiting for ${waitingFor}`,
      context
    );
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Raised by the transport boundary. Never reaches callers directly: the
 * connection turns it into a close with `TransportError` and attaches it as
 * the `cause` of the resulting {@link TargetClosedError}s.
 */
export class TransportFault extends CdpMuxError {
  constructor(message: string, context: CdpMuxErrorContext = {}) {
    super(message, context);
    this.name = "TransportFault";
  }
}

/**
 * The channel is closing or already closed. The connection records this as
 * `TransportClosed` rather than `TransportError`.
 */
export class TransportClosedFault extends TransportFault {
  constructor(message: string, context: CdpMuxErrorContext = {}) {
    super(message, context);
    this.name = "TransportClosedFault";
  }
}
