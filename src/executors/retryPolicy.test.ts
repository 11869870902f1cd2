import {
  AxiosError,
  AxiosHeaders,
  type InternalAxiosRequestConfig,
} from "axios";
import { describe, expect, it } from "vitest";

import { RetryPolicy } from "./retryPolicy";

const requestConfig = (method: string): InternalAxiosRequestConfig => ({
  method,
  headers: new AxiosHeaders(),
});

const statusError = (status: number, method = "post"): AxiosError => {
  const config = requestConfig(method);
  return new AxiosError("Request failed", "ERR_BAD_RESPONSE", config, null, {
    data: "",
    status,
    statusText: "",
    headers: {},
    config,
  });
};

const networkError = (code: string, method = "post"): AxiosError =>
  new AxiosError("socket hang up", code, requestConfig(method));

describe("RetryPolicy", () => {
  const policy = new RetryPolicy({ backoffFactor: 0.5 });

  it("retries transient statuses on POST", () => {
    for (const status of [429, 500, 502, 503, 504]) {
      expect(policy.shouldRetry(statusError(status))).toBe(true);
    }
  });

  it("does not retry other statuses", () => {
    expect(policy.shouldRetry(statusError(400))).toBe(false);
    expect(policy.shouldRetry(statusError(404))).toBe(false);
  });

  it("retries failures that produced no response", () => {
    expect(policy.shouldRetry(networkError("ECONNRESET"))).toBe(true);
    expect(policy.shouldRetry(networkError("ECONNABORTED"))).toBe(true);
  });

  it("never retries cancelled requests or other methods", () => {
    expect(policy.shouldRetry(networkError(AxiosError.ERR_CANCELED))).toBe(
      false,
    );
    expect(policy.shouldRetry(statusError(503, "get"))).toBe(false);
  });

  it("doubles the delay for each retry", () => {
    expect(policy.delayFor(1)).toBe(500);
    expect(policy.delayFor(2)).toBe(1000);
    expect(policy.delayFor(3)).toBe(2000);
  });

  it("counts the first attempt in maxAttempts", () => {
    expect(new RetryPolicy().retries).toBe(2);
    expect(new RetryPolicy({ maxAttempts: 0 }).retries).toBe(0);
  });

  it("accepts custom status codes", () => {
    const custom = new RetryPolicy({ retryStatusCodes: [409] });
    expect(custom.shouldRetry(statusError(409))).toBe(true);
    expect(custom.shouldRetry(statusError(503))).toBe(false);
  });
});
