/**
 * Default JSON document lookup
 *
 * Resolves field paths through nested objects and reduces the result to a closed LookupResult so
 * field generators never see untyped JSON values. Arrays are leaves: paths do not index into them.
 * Numbers are parsed losslessly and keep their source text, so 64-bit ids survive unchanged.
 */

import { isLosslessNumber, parse } from "lossless-json";
import type { DocumentInput, DocumentLookup, FieldPath, LookupResult } from "./types.js";

const decoder = new TextDecoder("utf-8");

/**
 * Decode a document body to a string
 */
export function decodeDocument(document: DocumentInput): string {
  return typeof document === "string" ? document : decoder.decode(document);
}

/**
 * Parse a document body, returning undefined when it is not valid JSON.
 * Numbers come back as `LosslessNumber` instances holding their source text.
 */
export function parseDocument(document: DocumentInput): unknown {
  try {
    return parse(decodeDocument(document));
  } catch {
    return undefined;
  }
}

/**
 * Stringify a JSON scalar.
 * Strings are returned verbatim and booleans as "true"/"false". Numbers parsed from a document
 * never reach here; plain `number` values use `Number.prototype.toString`.
 */
export function formatScalar(value: string | number | boolean): string {
  if (typeof value === "string") {
    return value;
  }

  return value.toString();
}

/**
 * Classify a decoded JSON value
 */
export function classify(value: unknown): LookupResult {
  if (value === undefined) {
    return { kind: "absent" };
  }

  if (value === null) {
    return { kind: "null" };
  }

  if (Array.isArray(value)) {
    return { kind: "array" };
  }

  if (isLosslessNumber(value)) {
    return { kind: "scalar", value: value.value };
  }

  switch (typeof value) {
    case "string":
    case "number":
    case "boolean":
      return { kind: "scalar", value: formatScalar(value) };
    case "object":
      return { kind: "object" };
    default:
      return { kind: "absent" };
  }
}

/**
 * Walk `path` through a decoded document
 */
export function resolvePath(root: unknown, path: FieldPath): unknown {
  let current = root;

  for (const key of path) {
    if (
      typeof current !== "object" ||
      current === null ||
      Array.isArray(current) ||
      isLosslessNumber(current)
    ) {
      return undefined;
    }

    if (!Object.hasOwn(current, key)) {
      return undefined;
    }

    current = Reflect.get(current, key);
  }

  return current;
}

/**
 * Look up a field in a JSON document. Documents that fail to parse resolve every path to "absent".
 */
export const jsonLookup: DocumentLookup = (document, path) => {
  const root = parseDocument(document);
  if (typeof root !== "object" || root === null || Array.isArray(root)) {
    return { kind: "absent" };
  }

  return classify(resolvePath(root, path));
};
