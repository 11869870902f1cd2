import { AxiosError } from "axios";

import { TransportDefaults } from "../constants/OperationConstant";

export interface RetryPolicyConfig {
  /** Total attempts per call, the first one included */
  maxAttempts?: number;
  /** Seconds; the wait before retry n is factor * 2^(n-1) */
  backoffFactor?: number;
  retryStatusCodes?: readonly number[];
}

/**
 * Which failures are transient for a SOAP POST, and how long to wait
 */
export class RetryPolicy {
  readonly maxAttempts: number;
  readonly backoffFactor: number;
  private readonly retryStatusCodes: ReadonlySet<number>;

  constructor(config: RetryPolicyConfig = {}) {
    this.maxAttempts = Math.max(
      1,
      config.maxAttempts ?? TransportDefaults.MAX_ATTEMPTS,
    );
    this.backoffFactor = Math.max(
      0,
      config.backoffFactor ?? TransportDefaults.BACKOFF_FACTOR,
    );
    this.retryStatusCodes = new Set(
      config.retryStatusCodes ?? TransportDefaults.RETRY_STATUS_CODES,
    );
  }

  /**
   * Retries after the first attempt
   */
  get retries(): number {
    return this.maxAttempts - 1;
  }

  shouldRetry(error: AxiosError): boolean {
    if (error.config?.method?.toLowerCase() !== "post") return false;
    if (error.code === AxiosError.ERR_CANCELED) return false;

    const status = error.response?.status;
    if (status === undefined) {
      // connection refused/reset, DNS, timeout: no response at all
      return true;
    }

    return this.retryStatusCodes.has(status);
  }

  /**
   * Delay in ms before the given retry (1-based)
   */
  delayFor(retryNumber: number): number {
    return this.backoffFactor * 1000 * Math.pow(2, retryNumber - 1);
  }
}
