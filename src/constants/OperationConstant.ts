import type {
  EndpointPathTable,
  OperationDescriptor,
  OperationKey,
  RemittanceEnvironment,
} from "../types/remittance.types";

export const SOAP11_NS = "http://schemas.xmlsoap.org/soap/envelope/";
export const MMT_NS = "MMT";
export const MMT_PREFIX = "mmt";
export const ACTION_PREFIX = "MMTaction/";

export const AUTH_SUCCESS_CODE = "1000";

/**
 * Key used when a response payload decodes to plain text
 */
export const RESPONSE_TEXT_KEY = "#text";

export const TransportDefaults = {
  TIMEOUT_MS: 30000,
  MAX_ATTEMPTS: 3,
  BACKOFF_FACTOR: 0.5, // seconds, doubled per retry
  RETRY_STATUS_CODES: [429, 500, 502, 503, 504],
} as const;

const SANDBOX_ROOT = "/HmgChile16";
const PRODUCTION_ROOT = "/Chile16";

const buildPathTable = (root: string): EndpointPathTable =>
  Object.freeze({
    // Auth
    AUTH: `${root}/aWs_Api_Auth2.aspx`,

    // Catalog
    RATES: `${root}/aWs_Api_Rates2.aspx`,
    BRANCHES: `${root}/aWs_Api_BranchesList2.aspx`,
    ORDERS_STATUS: `${root}/aWs_Api_OrdersStatus2.aspx`,

    // Send money
    ORDER_CALC: `${root}/aWs_Api_OrderCalc2.aspx`,
    RESERVE_KEY: `${root}/aWs_Api_ReserveKey2.aspx`,
    ORDER_IMPORT: `${root}/aWs_Api_OrderImport2.aspx`,

    // Others
    ORDER_UPDATE: `${root}/aWs_Api_OrderUpdate2.aspx`,
    ORDER_CANCEL: `${root}/aWs_Api_OrderCancel2.aspx`,
    ORDER_ACTIVATE: `${root}/aWs_Api_OrderActivate2.aspx`,
    ORDER_REFUND: `${root}/aWs_Api_OrderRefund2.aspx`,
    ORDER_VOUCHER: `${root}/aWs_Api_OrderVoucher2.aspx`,
    ORDER_VALIDATE: `${root}/aWs_Api_OrderValidate2.aspx`,
  });

export const PATHS_SANDBOX = buildPathTable(SANDBOX_ROOT);
export const PATHS_PRODUCTION = buildPathTable(PRODUCTION_ROOT);

export const pathsFor = (
  environment: RemittanceEnvironment,
): EndpointPathTable =>
  environment === "production" ? PATHS_PRODUCTION : PATHS_SANDBOX;

const defineOperation = (
  logicalName: OperationKey,
  soapActionName: string,
  requestWrapperElementName: string,
): OperationDescriptor =>
  Object.freeze({
    logicalName,
    soapActionName,
    requestWrapperElementName,
    endpointPathKey: logicalName,
  });

/**
 * Vendor action and request wrapper per logical operation
 */
export const OPERATIONS: Readonly<Record<OperationKey, OperationDescriptor>> =
  Object.freeze({
    AUTH: defineOperation("AUTH", "AWS_API_AUTH2.Execute", "Logintype"),
    RATES: defineOperation("RATES", "AWS_API_RATES2.Execute", "Rates2Request"),
    BRANCHES: defineOperation(
      "BRANCHES",
      "AWS_API_BRANCHESLIST2.Execute",
      "BranchList2Request",
    ),
    ORDERS_STATUS: defineOperation(
      "ORDERS_STATUS",
      "AWS_API_ORDERSSTATUS2.Execute",
      "OrderStatus2Request",
    ),
    ORDER_CALC: defineOperation(
      "ORDER_CALC",
      "AWS_API_ORDERCALC2.Execute",
      "OrderCalc2Request",
    ),
    RESERVE_KEY: defineOperation(
      "RESERVE_KEY",
      "AWS_API_RESERVEKEY2.Execute",
      "ReserveKey2Request",
    ),
    ORDER_IMPORT: defineOperation(
      "ORDER_IMPORT",
      "AWS_API_ORDERIMPORT2.Execute",
      "OrderImport2Request",
    ),
    ORDER_UPDATE: defineOperation(
      "ORDER_UPDATE",
      "AWS_API_ORDERUPDATE2.Execute",
      "OrderUpdate2Request",
    ),
    ORDER_CANCEL: defineOperation(
      "ORDER_CANCEL",
      "AWS_API_ORDERCANCEL2.Execute",
      "OrderCancel2Request",
    ),
    ORDER_ACTIVATE: defineOperation(
      "ORDER_ACTIVATE",
      "AWS_API_ORDERACTIVATE2.Execute",
      "OrderActivate2Request",
    ),
    ORDER_REFUND: defineOperation(
      "ORDER_REFUND",
      "AWS_API_ORDERREFUND2.Execute",
      "OrderRefund2Request",
    ),
    ORDER_VOUCHER: defineOperation(
      "ORDER_VOUCHER",
      "AWS_API_ORDERVOUCHER2.Execute",
      "OrderVoucher2Request",
    ),
    ORDER_VALIDATE: defineOperation(
      "ORDER_VALIDATE",
      "AWS_API_ORDERVALIDATE2.Execute",
      "OrderValidate2Request",
    ),
  });

export const soapActionFor = (descriptor: OperationDescriptor): string =>
  `${ACTION_PREFIX}${descriptor.soapActionName}`;

/**
 * Minimum OrderInfo fields for import, reserve-key and validate
 */
export const REQUIRED_ORDER_FIELDS = [
  "OrderDate",
  "SourceCountry",
  "SourceBranchID",
  "OrderCurrency",
  "OrderAmount",
  "PayoutBranchID",
  "Customer",
  "Beneficiary",
] as const;

export type RequiredOrderField = (typeof REQUIRED_ORDER_FIELDS)[number];

/**
 * Repeatable containers: parent local name -> children always decoded as lists
 */
export const DEFAULT_FORCE_LIST: Readonly<Record<string, readonly string[]>> =
  {
    Options: ["Option"],
    Branches: ["Branch", "BranchItem"],
    Currencies: ["Currency"],
    Rates: ["Rate"],
    Taxes: ["Tax"],
    Messages: ["Message"],
    Orders: ["Order"],
  };

export const RESPONSE_CODES: Readonly<Record<string, string>> = {
  "1000": "Operation completed successfully",
  "22": "Credit limit exceeded",
};

/**
 * Fields whose values never reach logs or error messages unmasked
 */
export const SENSITIVE_FIELDS = [
  "LoginUser",
  "LoginPass",
  "AccessToken",
  "AccessKey",
] as const;
