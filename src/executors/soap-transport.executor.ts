import axios, {
  isAxiosError,
  type AxiosInstance,
  type AxiosResponse,
} from "axios";
import axiosRetry, { type IAxiosRetryConfig } from "axios-retry";
import { v4 as uuidv4 } from "uuid";

import { SOAP11_NS, TransportDefaults } from "../constants/OperationConstant";
import {
  ServerError,
  SoapFaultError,
  TransportError,
} from "../errors/remittance.errors";
import { childText, findElement, parseXml } from "../parsers/xml-tree.parser";
import type {
  EndpointKey,
  EndpointPathTable,
  XmlElement,
} from "../types/remittance.types";
import defaultLogger, { loggerUtils, type Logger } from "../utils/logger";
import { sanitizeHeaders, scrubXml } from "../utils/redaction";
import { RetryPolicy, type RetryPolicyConfig } from "./retryPolicy";

export interface SoapTransportOptions {
  host: string;
  paths: EndpointPathTable;
  timeoutMs?: number;
  retry?: RetryPolicyConfig;
  /**
   * Pre-configured axios instance. The retry interceptor is installed once
   * per instance; each transport sends its own retry policy per request.
   */
  httpClient?: AxiosInstance;
  logger?: Logger;
}

/** instances that already carry the retry interceptor */
const retryInstalled = new WeakSet<AxiosInstance>();

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * HTTP leg of a SOAP call: POST, bounded retry, status and fault checks.
 * Holds no per-call state, so one instance can serve concurrent calls.
 */
export class SoapTransport {
  private readonly host: string;
  private readonly paths: EndpointPathTable;
  private readonly httpClient: AxiosInstance;
  private readonly retryPolicy: RetryPolicy;
  private readonly retryConfig: IAxiosRetryConfig;
  private readonly logger: Logger;

  constructor(options: SoapTransportOptions) {
    this.host = options.host.replace(/\/+$/, "");
    this.paths = options.paths;
    this.retryPolicy = new RetryPolicy(options.retry);
    this.logger = options.logger ?? defaultLogger;

    this.httpClient =
      options.httpClient ??
      axios.create({
        timeout: options.timeoutMs ?? TransportDefaults.TIMEOUT_MS,
        responseType: "text",
      });

    this.retryConfig = {
      retries: this.retryPolicy.retries,
      retryCondition: (error) => this.retryPolicy.shouldRetry(error),
      retryDelay: (retryCount) => this.retryPolicy.delayFor(retryCount),
      shouldResetTimeout: true,
      onRetry: (retryCount, error, requestConfig) => {
        this.logger.warn("Retrying SOAP request", {
          url: requestConfig.url,
          attempt: retryCount + 1,
          maxAttempts: this.retryPolicy.maxAttempts,
          status: error.response?.status,
          code: error.code,
        });
      },
    };

    if (!retryInstalled.has(this.httpClient)) {
      axiosRetry(this.httpClient, { retries: 0 });
      retryInstalled.add(this.httpClient);
    }
  }

  urlFor(pathKey: EndpointKey): string {
    return `${this.host}${this.paths[pathKey]}`;
  }

  /**
   * POST an envelope and return the parsed response root.
   *
   * @throws TransportError when no response arrived within the retry budget
   * @throws ServerError on a non-2xx status or a body that is not XML
   * @throws SoapFaultError when the response carries a SOAP Fault
   */
  async post(
    pathKey: EndpointKey,
    soapAction: string,
    envelopeXml: string,
  ): Promise<XmlElement> {
    const url = this.urlFor(pathKey);
    const headers: Record<string, string> = {
      "Content-Type": "text/xml; charset=utf-8",
      SOAPAction: soapAction,
      Accept: "text/xml",
      "X-Request-Id": uuidv4(),
    };

    this.logger.debug("SOAP request", {
      url,
      headers: sanitizeHeaders(headers),
      envelope: scrubXml(envelopeXml),
    });

    const startedAt = Date.now();
    let response: AxiosResponse<string>;

    try {
      response = await this.httpClient.post<string>(url, envelopeXml, {
        headers,
        responseType: "text",
        "axios-retry": this.retryConfig,
      });
    } catch (error) {
      const failure = this.toFailure(error, url);
      loggerUtils.logError(this.logger, failure, {
        url,
        soapAction,
        statusCode:
          failure instanceof ServerError ? failure.statusCode : undefined,
        duration: `${Date.now() - startedAt}ms`,
      });
      throw failure;
    }

    loggerUtils.logRequest(
      this.logger,
      "POST",
      url,
      response.status,
      Date.now() - startedAt,
      headers,
    );

    const body =
      typeof response.data === "string"
        ? response.data
        : String(response.data ?? "");

    let root: XmlElement;
    try {
      root = await parseXml(body);
    } catch (error) {
      throw new ServerError(
        `Invalid XML from ${url}: ${errorMessage(error)}`,
        response.status,
        url,
      );
    }

    const fault = findElement(
      root,
      (element) =>
        element.localName === "Fault" && element.namespace === SOAP11_NS,
    );
    if (fault) {
      throw new SoapFaultError(
        childText(fault, "faultcode"),
        childText(fault, "faultstring"),
      );
    }

    return root;
  }

  /**
   * Map an axios failure to a client error. The axios error itself is not
   * kept as cause: its config holds the request body, credentials included.
   */
  private toFailure(
    error: unknown,
    url: string,
  ): TransportError | ServerError {
    if (isAxiosError(error)) {
      if (error.response) {
        const status = error.response.status;
        return new ServerError(`HTTP ${status} at ${url}`, status, url);
      }
      return new TransportError(
        `Request to ${url} failed: ${error.code ?? error.message}`,
        url,
      );
    }
    return new TransportError(
      `Request to ${url} failed: ${errorMessage(error)}`,
      url,
    );
  }
}
