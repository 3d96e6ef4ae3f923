import { isRetryableError, withRetry } from "./retry";

const NO_WAIT = [0, 0, 0];

function failure(fields: Record<string, unknown>): Error {
  return Object.assign(new Error("request failed"), fields);
}

describe("isRetryableError", () => {
  it.each([
    [{ code: "ECONNRESET" }],
    [{ code: "ETIMEDOUT" }],
    [{ cause: { code: "ECONNRESET" } }],
    [{ status: 429 }],
    [{ statusCode: 503 }],
    [{ response: { status: 502 } }],
  ])("retries %j", (fields) => {
    expect(isRetryableError(failure(fields))).toBe(true);
  });

  it.each([[{ status: 400 }], [{ code: "ENOTFOUND" }], [{}]])(
    "does not retry %j",
    (fields) => {
      expect(isRetryableError(failure(fields))).toBe(false);
    }
  );

  it("does not retry values that are not objects", () => {
    expect(isRetryableError("boom")).toBe(false);
    expect(isRetryableError(null)).toBe(false);
  });
});

describe("withRetry", () => {
  it("returns the first successful result", async () => {
    const fn = jest.fn().mockResolvedValue("ok");

    await expect(withRetry(fn, "test.op", NO_WAIT)).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("retries transient failures", async () => {
    const fn = jest
      .fn()
      .mockRejectedValueOnce(failure({ status: 429 }))
      .mockResolvedValue("ok");

    await expect(withRetry(fn, "test.op", NO_WAIT)).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("rethrows a permanent failure immediately", async () => {
    const permanent = failure({ status: 401 });
    const fn = jest.fn().mockRejectedValue(permanent);

    await expect(withRetry(fn, "test.op", NO_WAIT)).rejects.toBe(permanent);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("gives up after the last backoff step", async () => {
    const transient = failure({ code: "ECONNRESET" });
    const fn = jest.fn().mockRejectedValue(transient);

    await expect(withRetry(fn, "test.op", NO_WAIT)).rejects.toBe(transient);
    expect(fn).toHaveBeenCalledTimes(NO_WAIT.length);
  });
});
