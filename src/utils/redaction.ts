import { SENSITIVE_FIELDS } from "../constants/OperationConstant";
import type {
  DecodedValue,
  DynamicMap,
  DynamicValue,
} from "../types/remittance.types";
import { isDynamicMap, isFieldMap } from "./valueGuards";

const SENSITIVE_HEADER_PARTS = ["authorization", "cookie", "set-cookie"];
const SENSITIVE_SET: ReadonlySet<string> = new Set(SENSITIVE_FIELDS);

const SENSITIVE_ELEMENT_PATTERN = new RegExp(
  `<((?:[A-Za-z_][\\w.-]*:)?(?:${SENSITIVE_FIELDS.join("|")}))>[^<]*</\\1>`,
  "g",
);

/**
 * Mask a secret, keeping a short prefix and suffix on long values
 */
export const redact = (value: string): string => {
  if (!value) return value;
  if (value.length <= 6) return "******";
  return `${value.slice(0, 3)}****${value.slice(-2)}`;
};

export const sanitizeHeaders = (
  headers: Record<string, string>,
): Record<string, string> => {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    const lower = key.toLowerCase();
    out[key] = SENSITIVE_HEADER_PARTS.some((part) => lower.includes(part))
      ? "<redacted>"
      : value;
  }
  return out;
};

/**
 * Mask the text of credential and token elements in an XML string
 */
export const scrubXml = (xml: string): string =>
  xml.replace(SENSITIVE_ELEMENT_PATTERN, "<$1>****</$1>");

const maskField = (key: string, value: DynamicValue): DynamicValue => {
  if (!SENSITIVE_SET.has(key)) return redactFields(value);
  if (typeof value === "string") return redact(value);
  return value === null || value === undefined ? value : "******";
};

/**
 * Deep copy of a request or response value with sensitive fields masked.
 * Maps come back as plain objects so they serialize in log output.
 */
export const redactFields = (
  value: DynamicValue | DecodedValue,
): DynamicValue => {
  const input: DynamicValue = value;

  if (Array.isArray(input)) {
    return input.map((item) => redactFields(item));
  }
  if (isFieldMap(input)) {
    const out: DynamicMap = {};
    for (const [key, item] of input) {
      out[key] = maskField(key, item);
    }
    return out;
  }
  if (isDynamicMap(input)) {
    const out: DynamicMap = {};
    for (const [key, item] of Object.entries(input)) {
      out[key] = maskField(key, item);
    }
    return out;
  }
  return input;
};
