import {
  applyDebugSettings,
  getDebugOptions,
  isDebugEnabled,
  setDebugOptions,
} from "@/debug/options";

describe("debug options", () => {
  const originalEnv = process.env.CDP_MUX_DEBUG;

  beforeEach(() => {
    setDebugOptions(undefined, false);
    delete process.env.CDP_MUX_DEBUG;
  });

  afterAll(() => {
    if (originalEnv === undefined) {
      delete process.env.CDP_MUX_DEBUG;
    } else {
      process.env.CDP_MUX_DEBUG = originalEnv;
    }
  });

  it("stores boolean debug flags and enabled state", () => {
    setDebugOptions({ cdpFrames: true, closeCascade: false }, true);

    expect(getDebugOptions()).toEqual({
      cdpFrames: true,
      closeCascade: false,
      enabled: true,
    });
  });

  it("ignores non-boolean debug option values", () => {
    setDebugOptions(
      {
        cdpFrames: true,
        closeCascade: "true" as unknown as boolean,
      },
      false
    );

    expect(getDebugOptions()).toEqual({
      cdpFrames: true,
      enabled: false,
    });
  });

  it("omits trap-prone debug option getters without throwing", () => {
    const trappedOptions = new Proxy(
      { cdpFrames: true },
      {
        get: (target, prop, receiver) => {
          if (prop === "closeCascade") {
            throw new Error("closeCascade trap");
          }
          return Reflect.get(target, prop, receiver);
        },
      }
    );

    expect(() => setDebugOptions(trappedOptions, true)).not.toThrow();
    expect(getDebugOptions()).toEqual({ cdpFrames: true, enabled: true });
  });

  it("prefers explicit options over the environment", () => {
    process.env.CDP_MUX_DEBUG = "cdpFrames";
    setDebugOptions({ cdpFrames: false }, true);

    expect(isDebugEnabled("cdpFrames")).toBe(false);
  });

  it("falls back to the CDP_MUX_DEBUG environment variable", () => {
    process.env.CDP_MUX_DEBUG = " closeCascade ,other";

    expect(isDebugEnabled("closeCascade")).toBe(true);
    expect(isDebugEnabled("cdpFrames")).toBe(false);

    process.env.CDP_MUX_DEBUG = "*";
    expect(isDebugEnabled("cdpFrames")).toBe(true);
  });

  it("parses CDP_MUX_DEBUG again only when it changes", () => {
    process.env.CDP_MUX_DEBUG = "cdpFrames,closeCascade";
    const splitSpy = jest.spyOn(String.prototype, "split");

    const first = isDebugEnabled("cdpFrames");
    const second = isDebugEnabled("closeCascade");
    const parses = splitSpy.mock.calls.length;
    splitSpy.mockRestore();

    expect([first, second]).toEqual([true, true]);
    expect(parses).toBe(1);
  });

  describe("applyDebugSettings", () => {
    it("turns on the flags named in options without the debug switch", () => {
      applyDebugSettings(false, { closeCascade: true });

      expect(getDebugOptions()).toEqual({ closeCascade: true, enabled: true });
      expect(isDebugEnabled("closeCascade")).toBe(true);
    });

    it("turns on every flag for the debug switch alone", () => {
      applyDebugSettings(true);

      expect(getDebugOptions()).toEqual({
        cdpFrames: true,
        closeCascade: true,
        enabled: true,
      });
    });

    it("leaves earlier settings alone when given nothing", () => {
      setDebugOptions({ cdpFrames: true }, true);

      applyDebugSettings(false);

      expect(getDebugOptions()).toEqual({ cdpFrames: true, enabled: true });
    });
  });
});
