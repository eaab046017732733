import { describe, it, expect } from "vitest";
import { TimeoutError } from "@hostnet/errors";
import { withTimeout } from "../timeout";

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe("withTimeout", () => {
  it("resolves successfully when promise completes before timeout", async () => {
    const result = await withTimeout(Promise.resolve("success"), 1000);

    expect(result.isOk()).toBe(true);
    expect(result.unwrap()).toBe("success");
  });

  it("returns TimeoutError when promise exceeds timeout", async () => {
    const slowPromise = sleep(500).then(() => "too late");

    const result = await withTimeout(slowPromise, 50);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(TimeoutError.is(result.error)).toBe(true);
      expect(result.error.message).toBe("Operation timed out after 50ms");
    }
  });

  it("uses custom error message when provided", async () => {
    const result = await withTimeout(sleep(500), 50, "eth0 did not come up");

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe("eth0 did not come up");
    }
  });

  it("wraps a rejected promise as TimeoutError", async () => {
    const result = await withTimeout(Promise.reject(new Error("Original error")), 1000);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(TimeoutError.is(result.error)).toBe(true);
    }
  });

  it("handles async value resolution", async () => {
    const asyncValue = async () => {
      await sleep(10);
      return { mtu: 9000 };
    };

    const result = await withTimeout(asyncValue(), 1000);

    expect(result.isOk()).toBe(true);
    expect(result.unwrap()).toEqual({ mtu: 9000 });
  });
});
