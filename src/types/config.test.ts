import {
  resolveConnectOptions,
  resolveConnectionOptions,
} from "@/types/config";

describe("resolveConnectionOptions", () => {
  it("fills in the default wait timeout", () => {
    expect(resolveConnectionOptions()).toEqual({ defaultTimeout: 30_000 });
    expect(resolveConnectionOptions({ defaultTimeout: 0 })).toEqual({
      defaultTimeout: 0,
    });
  });

  it("rejects a negative timeout", () => {
    expect(() => resolveConnectionOptions({ defaultTimeout: -1 })).toThrow(
      "Invalid connection options: defaultTimeout: Number must be greater than or equal to 0"
    );
  });
});

describe("resolveConnectOptions", () => {
  it("accepts a WebSocket endpoint and applies defaults", () => {
    expect(
      resolveConnectOptions({
        browserWSEndpoint: "ws://127.0.0.1:9222/devtools/browser/test-browser",
      })
    ).toEqual({
      browserWSEndpoint: "ws://127.0.0.1:9222/devtools/browser/test-browser",
      defaultTimeout: 30_000,
      debug: false,
    });
  });

  it("keeps debug settings", () => {
    const resolved = resolveConnectOptions({
      browserWSEndpoint: "wss://browser.test/devtools/browser/abc",
      debug: true,
      debugOptions: { cdpFrames: true },
      maxPayload: 1024,
    });

    expect(resolved.debug).toBe(true);
    expect(resolved.debugOptions).toEqual({ cdpFrames: true });
    expect(resolved.maxPayload).toBe(1024);
  });

  it("rejects endpoints that are not WebSocket URLs", () => {
    expect(() =>
      resolveConnectOptions({ browserWSEndpoint: "http://127.0.0.1:9222" })
    ).toThrow(
      "Invalid connect options: browserWSEndpoint: browserWSEndpoint must be a ws:// or wss:// URL"
    );
  });

  it("reports every invalid field", () => {
    expect(() =>
      resolveConnectOptions({ browserWSEndpoint: "not a url", handshakeTimeout: 0 })
    ).toThrow(
      /^Invalid connect options: browserWSEndpoint: Invalid url; .*handshakeTimeout: Number must be greater than 0$/
    );
  });
});
