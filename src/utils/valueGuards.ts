import type {
  DecodedMap,
  DecodedValue,
  DynamicMap,
  DynamicValue,
} from "../types/remittance.types";

export const isFieldMap = (
  value: unknown,
): value is ReadonlyMap<string, DynamicValue> => value instanceof Map;

export const isPlainRecord = (
  value: unknown,
): value is Record<string, unknown> =>
  value !== null &&
  typeof value === "object" &&
  !Array.isArray(value) &&
  !(value instanceof Map);

export const isDynamicMap = (value: DynamicValue): value is DynamicMap =>
  isPlainRecord(value);

export const isDecodedMap = (
  value: DecodedValue | undefined,
): value is DecodedMap => isPlainRecord(value);
