import {
  AUTH_SUCCESS_CODE,
  OPERATIONS,
} from "../constants/OperationConstant";
import { parseDueDate } from "../connectors/helpers/parseDueDate";
import { AuthError } from "../errors/remittance.errors";
import type { RemittanceSoapExecutor } from "../executors/remittance-soap.executor";
import { ResponseNormalizer } from "../services/responseNormalizer.service";
import type { Credentials, SessionState } from "../types/remittance.types";
import defaultLogger, { type Logger } from "../utils/logger";

export interface RemittanceSessionOptions {
  credentials?: Credentials;
  /** Operator-supplied static key; takes priority over the token as AccessKey */
  accessKey?: string;
  /** When false, ensureValid() never logs in on its own */
  autoAuthenticate?: boolean;
  clock?: () => Date;
  normalizer?: ResponseNormalizer;
  logger?: Logger;
}

/**
 * Token lifecycle for one client instance.
 *
 * Unauthenticated -> Authenticated(token, expiresAt?) on a successful AUTH
 * call. A failed attempt leaves the previous state untouched. Concurrent
 * logins share one in-flight request.
 */
export class RemittanceSession {
  private state: SessionState = { status: "unauthenticated" };
  private readonly credentials?: Credentials;
  private readonly accessKeyOverride?: string;
  private readonly autoAuthenticate: boolean;
  private readonly clock: () => Date;
  private readonly normalizer: ResponseNormalizer;
  private readonly logger: Logger;

  /** mutex */
  private loginPromise?: Promise<void>;

  constructor(
    private readonly executor: RemittanceSoapExecutor,
    options: RemittanceSessionOptions = {},
  ) {
    this.credentials = options.credentials;
    this.accessKeyOverride = options.accessKey || undefined;
    this.autoAuthenticate = options.autoAuthenticate ?? true;
    this.clock = options.clock ?? (() => new Date());
    this.normalizer = options.normalizer ?? new ResponseNormalizer();
    this.logger = options.logger ?? defaultLogger;
  }

  /* =======================
     Login (mutex protected)
  ======================= */
  async authenticate(): Promise<void> {
    if (this.loginPromise) {
      return this.loginPromise;
    }

    this.loginPromise = this.performLogin().finally(() => {
      this.loginPromise = undefined;
    });

    return this.loginPromise;
  }

  private async performLogin(): Promise<void> {
    const credentials = this.credentials;
    if (!credentials?.loginUser || !credentials.loginPass) {
      throw new AuthError(
        "Cannot authenticate: login credentials are not configured",
      );
    }

    this.logger.info("Authenticating with remittance service");

    const response = await this.executor.execute(OPERATIONS.AUTH, {
      LoginUser: credentials.loginUser,
      LoginPass: credentials.loginPass,
    });

    if (!response) {
      throw new AuthError("Authentication failed: Response not found");
    }

    const code =
      typeof response.ResponseCode === "string" ? response.ResponseCode : "";
    if (code !== AUTH_SUCCESS_CODE) {
      const failure = this.normalizer.errorFromResponse(response);
      throw new AuthError(
        `Authentication rejected (code ${failure.code || "none"}): ${failure.message}`,
      );
    }

    const token =
      typeof response.AccessToken === "string" ? response.AccessToken : "";
    const dueDate =
      typeof response.DueDate === "string" ? response.DueDate : undefined;
    const expiresAt = parseDueDate(dueDate);

    if (dueDate !== undefined && !expiresAt) {
      this.logger.warn("Unparseable token DueDate, expiry unknown", {
        dueDate,
      });
    }

    this.state = {
      status: "authenticated",
      token,
      expiresAt,
      authenticatedAt: this.clock(),
    };

    this.logger.info("Remittance session established", {
      expiresAt: expiresAt?.toISOString() ?? "unknown",
    });
  }

  /* =======================
     Ensure valid session
  ======================= */

  /**
   * Re-authenticate when there is no token, when it is due (now >= expiry),
   * or when its expiry is unknown. No-op with auto-authentication off.
   */
  async ensureValid(): Promise<void> {
    if (!this.autoAuthenticate) return;
    if (!this.needsRefresh()) return;
    await this.authenticate();
  }

  needsRefresh(): boolean {
    if (this.state.status === "unauthenticated") return true;
    const { expiresAt } = this.state;
    // unknown expiry counts as already due
    if (!expiresAt) return true;
    return this.clock().getTime() >= expiresAt.getTime();
  }

  /* =======================
     Outbound credentials
  ======================= */

  /**
   * Value for the AccessKey body field: override, else token, else ""
   */
  resolveAccessKey(): string {
    if (this.accessKeyOverride) return this.accessKeyOverride;
    return this.state.status === "authenticated" ? this.state.token : "";
  }

  /**
   * Token for the AuthHeader, sent even when an override key is in use
   */
  headerToken(): string | undefined {
    return this.state.status === "authenticated" && this.state.token
      ? this.state.token
      : undefined;
  }

  /**
   * Snapshot with its own Date copies
   */
  getState(): Readonly<SessionState> {
    if (this.state.status === "unauthenticated") return { ...this.state };
    const { expiresAt, authenticatedAt } = this.state;
    return {
      ...this.state,
      expiresAt: expiresAt ? new Date(expiresAt.getTime()) : undefined,
      authenticatedAt: new Date(authenticatedAt.getTime()),
    };
  }

  invalidate(): void {
    this.state = { status: "unauthenticated" };
  }
}
