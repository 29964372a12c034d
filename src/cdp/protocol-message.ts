import { z } from "zod";
import type { OutgoingMessage } from "./types";
import { CdpMuxError } from "../error";
import { formatDiagnostic } from "../utils/diagnostics";

const ProtocolErrorPayloadSchema = z.object({
  code: z.number(),
  message: z.string(),
  data: z.unknown().optional(),
});

export const ResponseMessageSchema = z.object({
  id: z.number().int(),
  result: z.unknown().optional(),
  error: ProtocolErrorPayloadSchema.optional(),
  sessionId: z.string().optional(),
});

export const EventMessageSchema = z.object({
  method: z.string(),
  params: z.unknown().optional(),
  sessionId: z.string().optional(),
});

export type ResponseMessage = z.infer<typeof ResponseMessageSchema>;
export type EventMessage = z.infer<typeof EventMessageSchema>;

export type InboundMessage =
  | { kind: "response"; message: ResponseMessage }
  | { kind: "event"; message: EventMessage };

export const AttachedToTargetParamsSchema = z.object({
  sessionId: z.string(),
  targetInfo: z.object({
    targetId: z.string(),
    type: z.string(),
  }),
});

export const DetachedFromTargetParamsSchema = z.object({
  sessionId: z.string(),
  targetId: z.string().optional(),
});

export class MalformedFrameError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MalformedFrameError";
  }
}

/**
 * Parses one text frame. Responses are recognised by their numeric `id`,
 * events by their `method`; anything else is rejected.
 */
export function parseInboundFrame(frame: string): InboundMessage {
  let raw: unknown;
  try {
    raw = JSON.parse(frame);
  } catch (error) {
    throw new MalformedFrameError(
      `Frame is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  if (typeof raw === "object" && raw !== null && "id" in raw) {
    const response = ResponseMessageSchema.safeParse(raw);
    if (response.success) {
      return { kind: "response", message: response.data };
    }
    throw new MalformedFrameError(
      `Invalid response frame: ${response.error.issues[0]?.message ?? "unknown issue"}`
    );
  }

  const event = EventMessageSchema.safeParse(raw);
  if (event.success) {
    return { kind: "event", message: event.data };
  }
  throw new MalformedFrameError(
    `Frame is neither a response nor an event: ${event.error.issues[0]?.message ?? "unknown issue"}`
  );
}

/**
 * Serializes one command. Params that JSON cannot represent (cycles,
 * bigints) fail here, before the command is registered or written.
 */
export function encodeOutgoingMessage(message: OutgoingMessage): string {
  try {
    return JSON.stringify(message);
  } catch (error) {
    throw new CdpMuxError(
      `Cannot serialize params for ${message.method}: ${formatDiagnostic(error)}`,
      { method: message.method, sessionId: message.sessionId ?? null, cause: error }
    );
  }
}
