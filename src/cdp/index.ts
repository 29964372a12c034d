export * from "./types";
export { Connection } from "./connection";
export { CdpSession, SessionHost } from "./session";
export {
  rawDataToString,
  WebSocketTransport,
  ConnectionTransport,
  TransportListener,
  WebSocketTransportOptions,
} from "./transport";
export { CommandRegistry, PredicateWaiterSet } from "./waiter-registry";
export { Deferred } from "./deferred";
export { CloseGuard } from "./close-guard";
export { SharedClose, scheduleDetached, waitWithin } from "./sync-bridge";
export {
  encodeOutgoingMessage,
  parseInboundFrame,
  MalformedFrameError,
} from "./protocol-message";
