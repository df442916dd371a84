import { computeBackoffDelay, retryWithBackoff } from "./retry";

describe("retryWithBackoff", () => {
  it("should return the first successful result", async () => {
    const fn = jest
      .fn<Promise<string>, []>()
      .mockRejectedValueOnce(new Error("flaky"))
      .mockResolvedValueOnce("ok");

    await expect(retryWithBackoff(fn, { maxAttempts: 3, initialDelayMs: 1 })).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("should throw the last error once the attempts are spent", async () => {
    const fn = jest
      .fn<Promise<string>, []>()
      .mockRejectedValueOnce(new Error("first"))
      .mockRejectedValueOnce(new Error("second"));

    await expect(retryWithBackoff(fn, { maxAttempts: 2, initialDelayMs: 1 })).rejects.toThrow("second");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("should stop when shouldRetry declines", async () => {
    const fn = jest.fn<Promise<string>, []>().mockRejectedValue(new Error("fatal"));

    await expect(
      retryWithBackoff(fn, { maxAttempts: 5, initialDelayMs: 1, shouldRetry: () => false })
    ).rejects.toThrow("fatal");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("should wrap non-error rejections", async () => {
    const fn = jest.fn<Promise<string>, []>().mockRejectedValue("plain");

    await expect(retryWithBackoff(fn, { maxAttempts: 1, initialDelayMs: 1 })).rejects.toThrow("plain");
  });
});

describe("computeBackoffDelay", () => {
  it("should grow exponentially within 20% jitter", () => {
    for (let i = 0; i < 20; i++) {
      const delay = computeBackoffDelay(3, 100, 2, 10000);
      expect(delay).toBeGreaterThanOrEqual(320);
      expect(delay).toBeLessThanOrEqual(480);
    }
  });

  it("should never exceed the cap", () => {
    expect(computeBackoffDelay(10, 1000, 2, 5000)).toBeLessThanOrEqual(5000);
  });
});
