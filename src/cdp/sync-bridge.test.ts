import { SharedClose, scheduleDetached, waitWithin } from "@/cdp/sync-bridge";

describe("scheduleDetached", () => {
  it("never runs the work on the caller's stack", async () => {
    const order: string[] = [];
    const pending = scheduleDetached(async () => {
      order.push("work");
      return 5;
    });
    order.push("caller");
    await Promise.resolve();
    order.push("microtask");

    await expect(pending).resolves.toBe(5);
    expect(order).toEqual(["caller", "microtask", "work"]);
  });

  it("propagates the work's rejection", async () => {
    await expect(
      scheduleDetached(async () => {
        throw new Error("close failed");
      })
    ).rejects.toThrow("close failed");
  });
});

describe("waitWithin", () => {
  it("resolves true when the promise settles in time", async () => {
    await expect(waitWithin(Promise.resolve("done"), 1_000)).resolves.toBe(true);
  });

  it("resolves false when the deadline passes first", async () => {
    const never = new Promise<void>(() => undefined);
    await expect(waitWithin(never, 10)).resolves.toBe(false);
  });

  it("rethrows a rejection", async () => {
    await expect(
      waitWithin(Promise.reject(new Error("boom")), 1_000)
    ).rejects.toThrow("boom");
  });
});

describe("SharedClose", () => {
  it("runs the work once for concurrent callers", async () => {
    const closing = new SharedClose();
    const work = jest.fn().mockResolvedValue(undefined);

    const first = closing.run(work);
    const second = closing.run(work);

    expect(second).toBe(first);
    await Promise.all([first, second]);
    expect(work).toHaveBeenCalledTimes(1);
  });

  it("runs again after a failed close", async () => {
    const closing = new SharedClose();
    const work = jest
      .fn()
      .mockRejectedValueOnce(new Error("refused"))
      .mockResolvedValue(undefined);

    await expect(closing.run(work)).rejects.toThrow("refused");
    await expect(closing.run(work)).resolves.toBeUndefined();

    expect(work).toHaveBeenCalledTimes(2);
  });
});
