import { Browser } from "./browser";

export * from "./cdp";
export * from "./browser";
export * from "./types";
export {
  CdpMuxError,
  CdpMuxErrorContext,
  ProtocolError,
  ProtocolErrorPayload,
  TargetClosedError,
  TimeoutError,
  TransportClosedFault,
  TransportFault,
} from "./error";
export {
  applyDebugSettings,
  CdpMuxDebugOptions,
  getDebugOptions,
  setDebugOptions,
} from "./debug/options";
export { formatDiagnostic, formatUnknownError } from "./utils/diagnostics";

export default Browser;
