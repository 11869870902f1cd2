/**
 * Base error for every failure raised by the client
 */
export class RemittanceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Network or IO failure that survived the retry budget
 */
export class TransportError extends RemittanceError {
  constructor(
    message: string,
    public readonly url?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/**
 * Non-2xx HTTP status or a body that is not XML
 */
export class ServerError extends RemittanceError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly url?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/**
 * SOAP Fault declared by the server
 */
export class SoapFaultError extends RemittanceError {
  constructor(
    public readonly faultCode: string,
    public readonly faultString: string,
  ) {
    super(`${faultCode}: ${faultString}`);
  }
}

export class AuthError extends RemittanceError {}

/**
 * Local precondition failure, never sent over the wire
 */
export class ValidationError extends RemittanceError {
  constructor(
    message: string,
    public readonly missingFields: string[] = [],
  ) {
    super(message);
  }
}

export const isRetryableError = (error: unknown): boolean =>
  error instanceof TransportError;
