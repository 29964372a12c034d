import { z } from "zod";
import { CdpMuxError } from "../error";

const DEFAULT_WAIT_TIMEOUT_MS = 30_000;

export const DebugOptionsSchema = z.object({
  cdpFrames: z.boolean().optional(),
  closeCascade: z.boolean().optional(),
});

export const ConnectionOptionsSchema = z.object({
  /**
   * Deadline for predicate waits that do not pass their own. `0` waits
   * forever. Commands never time out on their own.
   */
  defaultTimeout: z
    .number()
    .int()
    .nonnegative()
    .default(DEFAULT_WAIT_TIMEOUT_MS),
});

export const ConnectOptionsSchema = ConnectionOptionsSchema.extend({
  /** `ws://host:port/devtools/browser/<id>` as reported by `/json/version`. */
  browserWSEndpoint: z
    .string()
    .url()
    .refine((value) => /^wss?:\/\//.test(value), {
      message: "browserWSEndpoint must be a ws:// or wss:// URL",
    }),
  handshakeTimeout: z.number().int().positive().optional(),
  maxPayload: z.number().int().positive().optional(),
  debug: z.boolean().default(false),
  debugOptions: DebugOptionsSchema.optional(),
});

export type ConnectionOptions = z.input<typeof ConnectionOptionsSchema>;
export type ResolvedConnectionOptions = z.output<typeof ConnectionOptionsSchema>;
export type ConnectOptions = z.input<typeof ConnectOptionsSchema>;
export type ResolvedConnectOptions = z.output<typeof ConnectOptionsSchema>;

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join(".")}: ${issue.message}`
        : issue.message
    )
    .join("; ");
}

export function resolveConnectionOptions(
  options: ConnectionOptions = {}
): ResolvedConnectionOptions {
  const parsed = ConnectionOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new CdpMuxError(
      `Invalid connection options: ${describeIssues(parsed.error)}`
    );
  }
  return parsed.data;
}

export function resolveConnectOptions(
  options: ConnectOptions
): ResolvedConnectOptions {
  const parsed = ConnectOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new CdpMuxError(
      `Invalid connect options: ${describeIssues(parsed.error)}`
    );
  }
  return parsed.data;
}
