import WebSocket, { RawData } from "ws";
import { TransportClosedFault, TransportFault } from "../error";

export interface TransportListener {
  onFrame(frame: string): void;
  /** Clean closure of the channel. */
  onClosed(why: string): void;
  /** The channel failed; a close normally follows. */
  onError(error: Error): void;
}

/**
 * Bidirectional text-frame channel to the remote debugging endpoint. The
 * connection is its only user.
 */
export interface ConnectionTransport {
  readonly isOpen: boolean;
  listen(listener: TransportListener): void;
  /**
   * Throws {@link TransportClosedFault} once the channel is closing or
   * closed, and {@link TransportFault} when it is otherwise unavailable.
   */
  writeFrame(frame: string): void;
  close(): Promise<void>;
}

export function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString("utf8");
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString("utf8");
  }
  return data.toString("utf8");
}

export interface WebSocketTransportOptions {
  /** Largest inbound frame accepted, in bytes. */
  maxPayload?: number;
  handshakeTimeout?: number;
}

export class WebSocketTransport implements ConnectionTransport {
  private listener: TransportListener | null = null;
  private readonly buffered: string[] = [];

  private constructor(
    private readonly ws: WebSocket,
    readonly url: string
  ) {
    ws.on("message", (data: RawData) => this.deliver(rawDataToString(data)));
    ws.on("close", (code: number, reason: Buffer) => {
      this.listener?.onClosed(
        `socket-close code=${code} reason=${reason.toString("utf8")}`
      );
    });
    ws.on("error", (error: Error) => {
      this.listener?.onError(error);
    });
  }

  static async connect(
    url: string,
    options: WebSocketTransportOptions = {}
  ): Promise<WebSocketTransport> {
    const ws = new WebSocket(url, {
      perMessageDeflate: false,
      maxPayload: options.maxPayload ?? 256 * 1024 * 1024,
      handshakeTimeout: options.handshakeTimeout,
    });
    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error): void => reject(error);
      ws.once("error", onError);
      ws.once("open", () => {
        ws.off("error", onError);
        resolve();
      });
    });
    return new WebSocketTransport(ws, url);
  }

  get isOpen(): boolean {
    return this.ws.readyState === WebSocket.OPEN;
  }

  listen(listener: TransportListener): void {
    this.listener = listener;
    const pending = this.buffered.splice(0, this.buffered.length);
    for (const frame of pending) {
      listener.onFrame(frame);
    }
  }

  writeFrame(frame: string): void {
    const state = this.ws.readyState;
    if (state === WebSocket.CLOSING || state === WebSocket.CLOSED) {
      throw new TransportClosedFault(
        `WebSocket is ${state === WebSocket.CLOSING ? "closing" : "closed"}`
      );
    }
    if (state !== WebSocket.OPEN) {
      throw new TransportFault(`Cannot write to WebSocket in state ${state}`);
    }
    this.ws.send(frame);
  }

  async close(): Promise<void> {
    if (this.ws.readyState === WebSocket.CLOSED) return;
    await new Promise<void>((resolve) => {
      this.ws.once("close", () => resolve());
      if (this.ws.readyState !== WebSocket.CLOSING) {
        this.ws.close();
      }
    });
  }

  private deliver(frame: string): void {
    if (this.listener) {
      this.listener.onFrame(frame);
    } else {
      this.buffered.push(frame);
    }
  }
}
