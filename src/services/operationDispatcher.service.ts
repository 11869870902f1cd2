import { OPERATIONS } from "../constants/OperationConstant";
import { ValidationError } from "../errors/remittance.errors";
import type { RemittanceSoapExecutor } from "../executors/remittance-soap.executor";
import type { RemittanceSession } from "../sessionManagement/remittanceSession.service";
import type {
  OrderImportOptions,
  OrderInfo,
} from "../types/order.types";
import type {
  BusinessOperationKey,
  DecodedMap,
  DynamicFields,
  DynamicValue,
} from "../types/remittance.types";
import defaultLogger, { loggerUtils, type Logger } from "../utils/logger";
import { isFieldMap } from "../utils/valueGuards";
import { assertRequiredOrderFields } from "./orders/orderInfo.service";

const ACCESS_KEY_FIELD = "AccessKey";

/**
 * Prepend AccessKey unless the caller already set one. A field left
 * undefined counts as unset and is replaced.
 */
export const withAccessKey = (
  params: DynamicFields,
  accessKey: string,
): DynamicFields => {
  const entries: [string, DynamicValue][] = isFieldMap(params)
    ? [...params]
    : Object.entries(params);

  const given = entries.find(([key]) => key === ACCESS_KEY_FIELD);
  if (given !== undefined && given[1] !== undefined) return params;

  const rest = entries.filter(([key]) => key !== ACCESS_KEY_FIELD);

  return isFieldMap(params)
    ? new Map<string, DynamicValue>([[ACCESS_KEY_FIELD, accessKey], ...rest])
    : Object.fromEntries([[ACCESS_KEY_FIELD, accessKey], ...rest]);
};

/**
 * Routes business operations through the session and the SOAP executor
 */
export class OperationDispatcher {
  constructor(
    private readonly executor: RemittanceSoapExecutor,
    private readonly session: RemittanceSession,
    private readonly logger: Logger = defaultLogger,
  ) {}

  /**
   * Call any operation other than AUTH. Vendor failure codes come back as
   * data; only transport, fault and missing-payload conditions throw.
   */
  async call(
    operationKey: BusinessOperationKey,
    params: DynamicFields = {},
  ): Promise<DecodedMap> {
    const descriptor = OPERATIONS[operationKey];

    await this.session.ensureValid();

    const body = withAccessKey(params, this.session.resolveAccessKey());
    loggerUtils.logPayload(this.logger, `${operationKey} request`, body);

    const response = await this.executor.execute(
      descriptor,
      body,
      this.session.headerToken(),
    );

    if (!response) {
      throw new ValidationError(`${operationKey}: Response not found`);
    }

    loggerUtils.logPayload(this.logger, `${operationKey} response`, response);
    return response;
  }

  // ---------------------------------------------------------------------------
  // Order operations
  // ---------------------------------------------------------------------------

  async orderImport(
    order: OrderInfo,
    options: OrderImportOptions = {},
  ): Promise<DecodedMap> {
    assertRequiredOrderFields(order);

    const params: DynamicFields =
      options.reserveKey !== undefined
        ? { ReserveKey: options.reserveKey, OrderInfo: order }
        : { OrderInfo: order };

    return this.call("ORDER_IMPORT", params);
  }

  async reserveKey(order: OrderInfo): Promise<DecodedMap> {
    assertRequiredOrderFields(order);
    return this.call("RESERVE_KEY", { OrderInfo: order });
  }

  async orderValidate(order: OrderInfo): Promise<DecodedMap> {
    assertRequiredOrderFields(order);
    return this.call("ORDER_VALIDATE", { OrderInfo: order });
  }
}
