import type { ProtocolMapping } from "devtools-protocol/types/protocol-mapping";

/**
 * Why a connection, session or one of their owners closed. Every
 * close-triggered rejection carries one of these.
 */
export const CloseReason = {
  ExplicitClose: "ExplicitClose",
  TargetDetached: "TargetDetached",
  TransportClosed: "TransportClosed",
  TransportError: "TransportError",
} as const;

export type CloseReason = (typeof CloseReason)[keyof typeof CloseReason];

export type SessionState = "attached" | "detached" | "closed";

export type ProtocolCommand = keyof ProtocolMapping.Commands;

export type CommandParams<M extends ProtocolCommand> =
  ProtocolMapping.Commands[M]["paramsType"][0];

export type CommandResult<M extends ProtocolCommand> =
  ProtocolMapping.Commands[M]["returnType"];

export type EventHandler = (params: unknown) => void;

export type CloseHandler = (reason: CloseReason) => void;

/**
 * Picks the events a predicate waiter cares about. Returns the matched value,
 * or `undefined` to keep waiting.
 */
export type EventMatcher<T> = (params: unknown) => T | undefined;

export interface WaitForEventOptions {
  /** Milliseconds before the wait fails with a TimeoutError. `0` waits forever. */
  timeout?: number;
}

export interface OutgoingMessage {
  id: number;
  method: string;
  params?: object;
  sessionId?: string;
}

/**
 * What both the root connection and a per-target session expose to
 * page-level collaborators.
 */
export interface CDPChannel {
  readonly isClosed: boolean;
  readonly closeReason: CloseReason | null;
  send<M extends ProtocolCommand>(
    method: M,
    params?: CommandParams<M>
  ): Promise<CommandResult<M>>;
  on(event: string, handler: EventHandler): void;
  off(event: string, handler: EventHandler): void;
  once(event: string, handler: EventHandler): void;
  waitForEvent<T>(
    method: string,
    matcher: EventMatcher<T>,
    options?: WaitForEventOptions
  ): Promise<T>;
  onClosed(handler: CloseHandler): void;
  offClosed(handler: CloseHandler): void;
}
