export {
  ConnectOptions,
  ConnectionOptions,
  ResolvedConnectOptions,
  ResolvedConnectionOptions,
  ConnectOptionsSchema,
  ConnectionOptionsSchema,
  DebugOptionsSchema,
  resolveConnectOptions,
  resolveConnectionOptions,
} from "./config";
