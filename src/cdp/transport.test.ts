import { WebSocket, WebSocketServer } from "ws";
import {
  rawDataToString,
  TransportListener,
  WebSocketTransport,
} from "@/cdp/transport";
import { TransportClosedFault } from "@/error";

interface Recorded {
  frames: string[];
  errors: Error[];
  closedCalls: () => number;
  closed: Promise<string>;
  listener: TransportListener;
}

function record(): Recorded {
  const frames: string[] = [];
  const errors: Error[] = [];
  let calls = 0;
  let settle: (why: string) => void = () => undefined;
  const closed = new Promise<string>((resolve) => {
    settle = resolve;
  });
  return {
    frames,
    errors,
    closedCalls: () => calls,
    closed,
    listener: {
      onFrame: (frame) => frames.push(frame),
      onClosed: (why) => {
        calls++;
        settle(why);
      },
      onError: (error) => errors.push(error),
    },
  };
}

async function startServer(): Promise<{ server: WebSocketServer; url: string }> {
  const server = new WebSocketServer({ port: 0, host: "127.0.0.1" });
  await new Promise<void>((resolve) => server.once("listening", () => resolve()));
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error(`unexpected server address ${String(address)}`);
  }
  return { server, url: `ws://127.0.0.1:${address.port}` };
}

async function stopServer(server: WebSocketServer): Promise<void> {
  for (const client of Array.from(server.clients)) {
    client.terminate();
  }
  await new Promise<void>((resolve) => server.close(() => resolve()));
}

/** Resolves once the client has answered a ping, so every earlier frame reached it. */
function roundTrip(socket: WebSocket): Promise<void> {
  return new Promise<void>((resolve) => {
    socket.once("pong", () => resolve());
    socket.ping();
  });
}

describe("WebSocketTransport", () => {
  let server: WebSocketServer;
  let url: string;
  let serverErrors: Error[];

  beforeEach(async () => {
    ({ server, url } = await startServer());
    serverErrors = [];
    server.on("connection", (socket) => {
      socket.on("error", (error) => serverErrors.push(error));
    });
  });

  afterEach(async () => {
    await stopServer(server);
  });

  async function connectPair(
    options?: Parameters<typeof WebSocketTransport.connect>[1]
  ): Promise<{ transport: WebSocketTransport; remote: WebSocket }> {
    const accepted = new Promise<WebSocket>((resolve) =>
      server.once("connection", resolve)
    );
    const transport = await WebSocketTransport.connect(url, options);
    return { transport, remote: await accepted };
  }

  it("buffers frames that arrive before a listener is attached", async () => {
    const { transport, remote } = await connectPair();
    remote.send("first");
    remote.send(Buffer.from("second"));
    await roundTrip(remote);

    const recorded = record();
    transport.listen(recorded.listener);

    expect(recorded.frames).toEqual(["first", "second"]);
    await transport.close();
  });

  it("writes text frames to the remote end", async () => {
    const { transport, remote } = await connectPair();
    transport.listen(record().listener);
    const received = new Promise<string>((resolve) =>
      remote.once("message", (data) => resolve(rawDataToString(data)))
    );

    transport.writeFrame('{"id":1,"method":"Browser.getVersion"}');

    await expect(received).resolves.toBe('{"id":1,"method":"Browser.getVersion"}');
    expect(transport.isOpen).toBe(true);
    await transport.close();
  });

  it("reports a remote close and refuses later writes", async () => {
    const { transport, remote } = await connectPair();
    const recorded = record();
    transport.listen(recorded.listener);

    remote.close(1000, "bye");

    await expect(recorded.closed).resolves.toBe("socket-close code=1000 reason=bye");
    expect(transport.isOpen).toBe(false);
    expect(() => transport.writeFrame("{}")).toThrow(TransportClosedFault);
    expect(() => transport.writeFrame("{}")).toThrow("WebSocket is closed");
  });

  it("resolves close once the socket has closed", async () => {
    const { transport } = await connectPair();
    const recorded = record();
    transport.listen(recorded.listener);

    await transport.close();

    expect(recorded.closedCalls()).toBe(1);
    await expect(recorded.closed).resolves.toMatch(/^socket-close code=\d+/);
    await transport.close();
    expect(recorded.closedCalls()).toBe(1);
  });

  it("fails the channel on a frame larger than maxPayload", async () => {
    const { transport, remote } = await connectPair({ maxPayload: 16 });
    const recorded = record();
    transport.listen(recorded.listener);

    remote.send("x".repeat(64));

    await expect(recorded.closed).resolves.toMatch(/^socket-close code=\d+ reason=$/);
    expect(recorded.frames).toEqual([]);
    expect(recorded.errors.map((error) => error.message)).toEqual([
      "Max payload size exceeded",
    ]);
  });

  it("rejects connect when nothing listens on the port", async () => {
    const { server: gone, url: goneUrl } = await startServer();
    await stopServer(gone);

    await expect(WebSocketTransport.connect(goneUrl)).rejects.toThrow("ECONNREFUSED");
  });
});

describe("rawDataToString", () => {
  it("decodes every shape ws hands out", () => {
    const bytes = new ArrayBuffer(3);
    new Uint8Array(bytes).set([0x61, 0x62, 0x63]);

    expect(rawDataToString(Buffer.from("plain"))).toBe("plain");
    expect(rawDataToString([Buffer.from("frag"), Buffer.from("ment")])).toBe("fragment");
    expect(rawDataToString(bytes)).toBe("abc");
  });
});
