import type { DecodedValue } from "../../types/remittance.types";

/**
 * Normalize a decoded field that may be absent, empty, single or repeated
 * into an array.
 */
const asList = (value: DecodedValue | undefined): DecodedValue[] => {
  if (value === undefined || value === "") return [];
  if (Array.isArray(value)) return value;
  return [value];
};

export { asList };
