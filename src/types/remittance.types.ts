/**
 * Scalar accepted on the request side. Numbers and booleans are written as text.
 */
export type XmlScalar = string | number | boolean;

/**
 * Outbound request value: scalar, ordered field map or sequence.
 * A sequence repeats its parent's tag once per item.
 */
export type DynamicValue =
  | XmlScalar
  | null
  | undefined
  | DynamicValue[]
  | DynamicMap
  | ReadonlyMap<string, DynamicValue>;

export interface DynamicMap {
  [field: string]: DynamicValue;
}

/**
 * Field set passed by callers. Plain objects keep their insertion order
 * (XML names never look like array indexes), Maps are accepted as well.
 */
export type DynamicFields = DynamicMap | ReadonlyMap<string, DynamicValue>;

/**
 * Inbound decoded value. Leaves are always strings.
 */
export type DecodedValue = string | DecodedValue[] | DecodedMap;

export interface DecodedMap {
  [field: string]: DecodedValue;
}

/**
 * Namespace-aware view of a parsed XML element
 */
export interface XmlElement {
  name: string;
  localName: string;
  namespace: string;
  text: string;
  children: XmlElement[];
}

export type EndpointKey =
  | "AUTH"
  | "RATES"
  | "BRANCHES"
  | "ORDERS_STATUS"
  | "ORDER_CALC"
  | "RESERVE_KEY"
  | "ORDER_IMPORT"
  | "ORDER_UPDATE"
  | "ORDER_CANCEL"
  | "ORDER_ACTIVATE"
  | "ORDER_REFUND"
  | "ORDER_VOUCHER"
  | "ORDER_VALIDATE";

export type OperationKey = EndpointKey;

export type BusinessOperationKey = Exclude<OperationKey, "AUTH">;

export type EndpointPathTable = Readonly<Record<EndpointKey, string>>;

export type RemittanceEnvironment = "sandbox" | "production";

export interface OperationDescriptor {
  readonly logicalName: OperationKey;
  readonly soapActionName: string;
  readonly requestWrapperElementName: string;
  readonly endpointPathKey: EndpointKey;
}

export interface Credentials {
  loginUser: string;
  loginPass: string;
}

/**
 * Session state owned by a single client instance
 */
export type SessionState =
  | { status: "unauthenticated" }
  | {
      status: "authenticated";
      token: string;
      /** undefined when the server's DueDate was missing or unparseable */
      expiresAt?: Date;
      authenticatedAt: Date;
    };

export interface ResponseFailure {
  code: string;
  message: string;
  details?: DecodedValue;
}
