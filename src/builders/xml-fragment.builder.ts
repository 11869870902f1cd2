import { MMT_PREFIX } from "../constants/OperationConstant";
import type { DynamicValue } from "../types/remittance.types";
import { isDynamicMap, isFieldMap } from "../utils/valueGuards";

const XML_ESCAPES: Readonly<Record<string, string>> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&apos;",
};

export const escapeXml = (text: string): string =>
  text.replace(/[&<>"']/g, (char) => XML_ESCAPES[char] ?? char);

const wrap = (content: string, name: string | undefined, prefix: string) =>
  name ? `<${prefix}:${name}>${content}</${prefix}:${name}>` : content;

const encodeFields = (
  entries: Iterable<[string, DynamicValue]>,
  prefix: string,
): string => {
  let out = "";
  for (const [key, value] of entries) {
    // undefined means "not provided": the field is left out entirely
    if (value === undefined) continue;
    out += encodeValue(value, key, prefix);
  }
  return out;
};

/**
 * Encode a request value into a namespaced XML fragment.
 *
 * - `null`/`undefined` become an empty element (or nothing without a name)
 * - scalars become escaped text content
 * - maps encode their fields in insertion order, wrapped only when named
 * - sequences repeat the given name once per item
 *
 * @param value - Value to encode
 * @param name - Element name; omit to merge a map's fields into the parent
 * @param prefix - Namespace prefix bound in the envelope
 */
export const encodeValue = (
  value: DynamicValue,
  name?: string,
  prefix: string = MMT_PREFIX,
): string => {
  if (value === null || value === undefined) {
    return wrap("", name, prefix);
  }

  if (Array.isArray(value)) {
    return value.map((item) => encodeValue(item, name, prefix)).join("");
  }

  if (isFieldMap(value)) {
    return wrap(encodeFields(value.entries(), prefix), name, prefix);
  }

  if (isDynamicMap(value)) {
    return wrap(encodeFields(Object.entries(value), prefix), name, prefix);
  }

  return wrap(escapeXml(String(value)), name, prefix);
};
