import CdpMuxDefault, {
  Browser,
  CdpMuxError,
  CloseReason,
  Connection,
  ProtocolError,
  TargetClosedError,
  TimeoutError,
  TransportFault,
  waitWithin,
} from "@/index";
import type {
  CDPChannel,
  ConnectOptions,
  ConnectionTransport,
  NetworkRequest,
  NetworkResponse,
  PageCloseOptions,
  SessionState,
  WaitForEventOptions,
} from "@/index";

describe("public API exports", () => {
  it("exposes runtime entrypoint symbols", () => {
    expect(CdpMuxDefault).toBe(Browser);
    expect(typeof Connection.connect).toBe("function");
    expect(typeof waitWithin).toBe("function");
    expect(Object.values(CloseReason)).toEqual([
      "ExplicitClose",
      "TargetDetached",
      "TransportClosed",
      "TransportError",
    ]);
  });

  it("keeps the error hierarchy", () => {
    expect(new ProtocolError({ code: -1, message: "bad" })).toBeInstanceOf(CdpMuxError);
    expect(new TargetClosedError(CloseReason.ExplicitClose)).toBeInstanceOf(CdpMuxError);
    expect(new TimeoutError(10, "Page.loadEventFired")).toBeInstanceOf(CdpMuxError);
    expect(new TransportFault("gone")).toBeInstanceOf(CdpMuxError);
    expect(new TargetClosedError(CloseReason.ExplicitClose).message).toBe(
      "Protocol error: Target closed. (ExplicitClose)"
    );
  });

  it("keeps core public types importable from the package entrypoint", () => {
    type PublicTypeSmoke = {
      channel: CDPChannel;
      connectOptions: ConnectOptions;
      transport: ConnectionTransport;
      request: NetworkRequest;
      response: NetworkResponse;
      closeOptions: PageCloseOptions;
      state: SessionState;
      waitOptions: WaitForEventOptions;
    };

    const typeSmoke: PublicTypeSmoke | null = null;
    expect(typeSmoke).toBeNull();
  });
});
