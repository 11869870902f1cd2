import { parseStringPromise } from "xml2js";

import type { XmlElement } from "../types/remittance.types";
import { isPlainRecord } from "../utils/valueGuards";

// xml2js reserved keys in xmlns mode: attributes, text, namespace info
const ATTR_KEY = "$";
const CHAR_KEY = "_";
const NS_KEY = "$ns";

const PARSER_OPTIONS = {
  xmlns: true,
  explicitArray: true,
  explicitRoot: true,
  trim: false,
  strict: true,
} as const;

const localNameOf = (qualifiedName: string): string => {
  const index = qualifiedName.indexOf(":");
  return index === -1 ? qualifiedName : qualifiedName.slice(index + 1);
};

const readNamespace = (
  node: Record<string, unknown>,
): { uri: string; local?: string } => {
  const ns = node[NS_KEY];
  if (!isPlainRecord(ns)) return { uri: "" };
  return {
    uri: typeof ns.uri === "string" ? ns.uri : "",
    local: typeof ns.local === "string" ? ns.local : undefined,
  };
};

/**
 * Convert one xml2js node into an XmlElement. Children are grouped by tag
 * in order of first appearance, and each group keeps document order.
 */
const toElement = (name: string, node: unknown): XmlElement => {
  if (!isPlainRecord(node)) {
    return {
      name,
      localName: localNameOf(name),
      namespace: "",
      text: typeof node === "string" ? node : "",
      children: [],
    };
  }

  const { uri, local } = readNamespace(node);
  const children: XmlElement[] = [];

  for (const [key, value] of Object.entries(node)) {
    if (key === ATTR_KEY || key === CHAR_KEY || key === NS_KEY) continue;
    const items: unknown[] = Array.isArray(value) ? value : [value];
    for (const item of items) {
      children.push(toElement(key, item));
    }
  }

  const text = node[CHAR_KEY];

  return {
    name,
    localName: local ?? localNameOf(name),
    namespace: uri,
    text: typeof text === "string" ? text : "",
    children,
  };
};

/**
 * Parse an XML document into a namespace-aware element tree.
 * Rejects on malformed XML and on an empty document.
 */
export const parseXml = async (xml: string): Promise<XmlElement> => {
  const parsed: unknown = await parseStringPromise(xml, PARSER_OPTIONS);

  if (!isPlainRecord(parsed)) {
    throw new Error("Empty XML document");
  }

  const [rootName] = Object.keys(parsed);
  if (!rootName) {
    throw new Error("XML document has no root element");
  }

  return toElement(rootName, parsed[rootName]);
};

/**
 * Depth-first, document-order search (the start element included)
 */
export const findElement = (
  root: XmlElement,
  predicate: (element: XmlElement) => boolean,
): XmlElement | undefined => {
  if (predicate(root)) return root;
  for (const child of root.children) {
    const found = findElement(child, predicate);
    if (found) return found;
  }
  return undefined;
};

export const childText = (
  element: XmlElement,
  localName: string,
): string => {
  const child = element.children.find((c) => c.localName === localName);
  return child ? child.text.trim() : "";
};
