export {
  RemittanceClient,
  type ListBranchesOptions,
  type RemittanceClientOptions,
} from "./connectors/remittance.connector";

export { loadConfig, type RemittanceConfig } from "./config/config";

export {
  OPERATIONS,
  PATHS_PRODUCTION,
  PATHS_SANDBOX,
  REQUIRED_ORDER_FIELDS,
  RESPONSE_CODES,
  pathsFor,
  soapActionFor,
} from "./constants/OperationConstant";

export {
  AuthError,
  RemittanceError,
  ServerError,
  SoapFaultError,
  TransportError,
  ValidationError,
  isRetryableError,
} from "./errors/remittance.errors";

export { encodeValue, escapeXml } from "./builders/xml-fragment.builder";
export {
  buildAuthHeader,
  buildOperationEnvelope,
  buildSoapEnvelope,
} from "./connectors/Envelopes/buildSoapEnvelope";
export { decodeElement, decodeResponse } from "./parsers/dynamic-value.parser";
export { ForceListRegistry } from "./parsers/forceListRegistry";
export { parseXml } from "./parsers/xml-tree.parser";

export { SoapTransport } from "./executors/soap-transport.executor";
export { RetryPolicy } from "./executors/retryPolicy";
export { RemittanceSoapExecutor } from "./executors/remittance-soap.executor";
export { RemittanceSession } from "./sessionManagement/remittanceSession.service";
export { OperationDispatcher } from "./services/operationDispatcher.service";

export {
  ResponseNormalizer,
  codeToMessage,
  errorFromResponse,
  isSuccessResponse,
  messageCodes,
} from "./services/responseNormalizer.service";
export { asList } from "./connectors/helpers/asList";
export { catalogLabel, bankAttributesFor } from "./services/catalogs.service";
export {
  assertRequiredOrderFields,
  orderInfoMin,
  personMin,
} from "./services/orders/orderInfo.service";
export {
  redact,
  redactFields,
  sanitizeHeaders,
  scrubXml,
} from "./utils/redaction";

export type * from "./types/remittance.types";
export type * from "./types/order.types";
