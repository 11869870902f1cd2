import { RESPONSE_TEXT_KEY } from "../constants/OperationConstant";
import type {
  DecodedMap,
  DecodedValue,
  XmlElement,
} from "../types/remittance.types";
import { isDecodedMap } from "../utils/valueGuards";
import { ForceListRegistry } from "./forceListRegistry";

const defaultRegistry = ForceListRegistry.defaults();

const isEmptyValue = (value: DecodedValue): boolean =>
  value === "" || (isDecodedMap(value) && Object.keys(value).length === 0);

/**
 * Decode an element into a DecodedValue.
 *
 * Leaves become their trimmed text. A repeated child tag is promoted to a
 * list on its second occurrence; children registered for this element in
 * the ForceListRegistry are lists even when they appear once.
 */
export const decodeElement = (
  element: XmlElement,
  registry: ForceListRegistry = defaultRegistry,
): DecodedValue => {
  if (element.children.length === 0) {
    return element.text.trim();
  }

  const bucket = new Map<string, DecodedValue>();

  for (const child of element.children) {
    const key = child.localName;
    const value = decodeElement(child, registry);
    const existing = bucket.get(key);

    if (existing === undefined) {
      bucket.set(key, value);
    } else if (Array.isArray(existing)) {
      existing.push(value);
    } else {
      bucket.set(key, [existing, value]);
    }
  }

  for (const forced of registry.childrenOf(element.localName)) {
    const value = bucket.get(forced);
    if (value === undefined || Array.isArray(value)) continue;
    bucket.set(forced, isEmptyValue(value) ? [] : [value]);
  }

  // fromEntries defines own properties, so names like __proto__ stay data
  return Object.fromEntries(bucket);
};

/**
 * Decode a response payload, always yielding a map
 */
export const decodeResponse = (
  element: XmlElement,
  registry: ForceListRegistry = defaultRegistry,
): DecodedMap => {
  const decoded = decodeElement(element, registry);
  if (isDecodedMap(decoded)) return decoded;
  return { [RESPONSE_TEXT_KEY]: decoded };
};
