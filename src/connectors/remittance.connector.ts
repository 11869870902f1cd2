import type { AxiosInstance } from "axios";

import { loadConfig } from "../config/config";
import { pathsFor } from "../constants/OperationConstant";
import { RemittanceSoapExecutor } from "../executors/remittance-soap.executor";
import { SoapTransport } from "../executors/soap-transport.executor";
import { ForceListRegistry } from "../parsers/forceListRegistry";
import { OperationDispatcher } from "../services/operationDispatcher.service";
import { ResponseNormalizer } from "../services/responseNormalizer.service";
import { RemittanceSession } from "../sessionManagement/remittanceSession.service";
import type { OrderImportOptions, OrderInfo } from "../types/order.types";
import type {
  Credentials,
  DecodedMap,
  DecodedValue,
  DynamicFields,
  DynamicMap,
  EndpointPathTable,
  RemittanceEnvironment,
  ResponseFailure,
  SessionState,
} from "../types/remittance.types";
import defaultLogger, { createLogger, type Logger } from "../utils/logger";
import { isDecodedMap } from "../utils/valueGuards";
import { asList } from "./helpers/asList";

export interface RemittanceClientOptions {
  /** Scheme, host and port, e.g. https://host:7002 */
  host: string;
  environment?: RemittanceEnvironment;
  /** Overrides the path table picked by environment */
  paths?: EndpointPathTable;
  credentials?: Credentials;
  accessKey?: string;
  autoAuthenticate?: boolean;
  timeoutMs?: number;
  maxAttempts?: number;
  backoffFactor?: number;
  /** Extra repeatable containers, or a full registry */
  forceList?: ForceListRegistry | Readonly<Record<string, readonly string[]>>;
  /** Extra vendor response codes */
  responseCodes?: Readonly<Record<string, string>>;
  clock?: () => Date;
  logger?: Logger;
  httpClient?: AxiosInstance;
}

export interface ListBranchesOptions {
  pageSize?: number;
  /** Upper bound on requests, in case the server never ends the sequence */
  maxPages?: number;
}

const DEFAULT_BRANCH_PAGE_SIZE = 1000;
const DEFAULT_BRANCH_MAX_PAGES = 100;

const resolveRegistry = (
  forceList: RemittanceClientOptions["forceList"],
): ForceListRegistry => {
  if (forceList instanceof ForceListRegistry) return forceList;
  const defaults = ForceListRegistry.defaults();
  return forceList ? defaults.extend(forceList) : defaults;
};

const branchEntries = (response: DecodedMap): DecodedValue[] => {
  const branches = response.Branches;
  if (!isDecodedMap(branches)) return [];
  const branch = asList(branches.Branch);
  return branch.length > 0 ? branch : asList(branches.BranchItem);
};

/**
 * Remittance provider client. Each instance owns its own session and
 * HTTP client; nothing is shared between instances.
 */
export class RemittanceClient {
  private readonly session: RemittanceSession;
  private readonly dispatcher: OperationDispatcher;
  private readonly normalizer: ResponseNormalizer;
  private readonly logger: Logger;

  constructor(options: RemittanceClientOptions) {
    this.logger = options.logger ?? defaultLogger;
    this.normalizer = new ResponseNormalizer(options.responseCodes);

    const transport = new SoapTransport({
      host: options.host,
      paths: options.paths ?? pathsFor(options.environment ?? "sandbox"),
      timeoutMs: options.timeoutMs,
      retry: {
        maxAttempts: options.maxAttempts,
        backoffFactor: options.backoffFactor,
      },
      httpClient: options.httpClient,
      logger: this.logger,
    });

    const executor = new RemittanceSoapExecutor(
      transport,
      resolveRegistry(options.forceList),
    );

    this.session = new RemittanceSession(executor, {
      credentials: options.credentials,
      accessKey: options.accessKey,
      autoAuthenticate: options.autoAuthenticate,
      clock: options.clock,
      normalizer: this.normalizer,
      logger: this.logger,
    });

    this.dispatcher = new OperationDispatcher(
      executor,
      this.session,
      this.logger,
    );
  }

  /**
   * Client configured from REMIT_* environment variables (and .env)
   */
  static fromEnv(
    env?: Record<string, string | undefined>,
    overrides: Partial<RemittanceClientOptions> = {},
  ): RemittanceClient {
    const config = loadConfig(env);

    const credentials =
      config.REMIT_LOGIN_USER && config.REMIT_LOGIN_PASS
        ? {
            loginUser: config.REMIT_LOGIN_USER,
            loginPass: config.REMIT_LOGIN_PASS,
          }
        : undefined;

    return new RemittanceClient({
      host: config.REMIT_HOST,
      environment: config.REMIT_ENVIRONMENT,
      credentials,
      accessKey: config.REMIT_ACCESS_KEY,
      autoAuthenticate: config.REMIT_AUTO_AUTH,
      timeoutMs: config.REMIT_TIMEOUT_MS,
      maxAttempts: config.REMIT_MAX_ATTEMPTS,
      backoffFactor: config.REMIT_BACKOFF_FACTOR,
      logger: overrides.logger ?? createLogger({ logLevel: config.LOG_LEVEL }),
      ...overrides,
    });
  }

  // ---------------------------------------------------------------------------
  // Session
  // ---------------------------------------------------------------------------

  authenticate(): Promise<void> {
    return this.session.authenticate();
  }

  ensureValid(): Promise<void> {
    return this.session.ensureValid();
  }

  getSessionState(): Readonly<SessionState> {
    return this.session.getState();
  }

  invalidateSession(): void {
    this.session.invalidate();
  }

  // ---------------------------------------------------------------------------
  // Catalog
  // ---------------------------------------------------------------------------

  rates(params: DynamicFields = {}): Promise<DecodedMap> {
    return this.dispatcher.call("RATES", params);
  }

  branches(params: DynamicFields = {}): Promise<DecodedMap> {
    return this.dispatcher.call("BRANCHES", params);
  }

  /**
   * Every branch entry across pages, following NextID until the server
   * returns "0" or an empty or repeated id
   */
  async listAllBranches(
    params: DynamicMap = {},
    options: ListBranchesOptions = {},
  ): Promise<DecodedValue[]> {
    const pageSize = options.pageSize ?? DEFAULT_BRANCH_PAGE_SIZE;
    const maxPages = options.maxPages ?? DEFAULT_BRANCH_MAX_PAGES;

    const entries: DecodedValue[] = [];
    const seen = new Set<string>();
    let nextId = "0";

    for (let page = 1; page <= maxPages; page++) {
      seen.add(nextId);
      const response = await this.branches({
        ...params,
        MaxResults: pageSize,
        NextID: nextId,
      });
      entries.push(...branchEntries(response));

      nextId = typeof response.NextID === "string" ? response.NextID.trim() : "";
      if (!nextId || nextId === "0" || seen.has(nextId)) {
        return entries;
      }
    }

    this.logger.warn("Branch listing stopped at page limit", { maxPages });
    return entries;
  }

  ordersStatus(params: DynamicFields = {}): Promise<DecodedMap> {
    return this.dispatcher.call("ORDERS_STATUS", params);
  }

  // ---------------------------------------------------------------------------
  // Send money
  // ---------------------------------------------------------------------------

  orderCalc(params: DynamicFields = {}): Promise<DecodedMap> {
    return this.dispatcher.call("ORDER_CALC", params);
  }

  reserveKey(order: OrderInfo): Promise<DecodedMap> {
    return this.dispatcher.reserveKey(order);
  }

  orderImport(
    order: OrderInfo,
    options: OrderImportOptions = {},
  ): Promise<DecodedMap> {
    return this.dispatcher.orderImport(order, options);
  }

  orderValidate(order: OrderInfo): Promise<DecodedMap> {
    return this.dispatcher.orderValidate(order);
  }

  // ---------------------------------------------------------------------------
  // Order lifecycle
  // ---------------------------------------------------------------------------

  orderUpdate(params: DynamicFields = {}): Promise<DecodedMap> {
    return this.dispatcher.call("ORDER_UPDATE", params);
  }

  orderCancel(params: DynamicFields = {}): Promise<DecodedMap> {
    return this.dispatcher.call("ORDER_CANCEL", params);
  }

  orderActivate(params: DynamicFields = {}): Promise<DecodedMap> {
    return this.dispatcher.call("ORDER_ACTIVATE", params);
  }

  orderRefund(params: DynamicFields = {}): Promise<DecodedMap> {
    return this.dispatcher.call("ORDER_REFUND", params);
  }

  orderVoucher(params: DynamicFields = {}): Promise<DecodedMap> {
    return this.dispatcher.call("ORDER_VOUCHER", params);
  }

  // ---------------------------------------------------------------------------
  // Normalization
  // ---------------------------------------------------------------------------

  codeToMessage(code: string | number): string {
    return this.normalizer.codeToMessage(code);
  }

  errorFromResponse(response: DecodedMap): ResponseFailure {
    return this.normalizer.errorFromResponse(response);
  }

  isSuccessResponse(response: DecodedMap): boolean {
    return this.normalizer.isSuccess(response);
  }

  messageCodes(response: DecodedMap): Set<string> {
    return this.normalizer.messageCodes(response);
  }
}
