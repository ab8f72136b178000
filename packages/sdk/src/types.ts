/**
 * Core types for key generation
 */

/**
 * A path to a (possibly) nested field in a JSON document, one entry per nesting level
 * @example ["nested", "key"]
 */
export type FieldPath = readonly string[];

/**
 * Raw document body; strings are treated as already-decoded UTF-8
 */
export type DocumentInput = Uint8Array | string;

/**
 * Outcome of resolving a field path against a document
 */
export type LookupResult =
  | { kind: "absent" }
  | { kind: "null" }
  | { kind: "array" }
  | { kind: "object" }
  | { kind: "scalar"; value: string };

/**
 * Resolves a field path against a document. Must be synchronous and free of I/O.
 */
export type DocumentLookup = (document: DocumentInput, path: FieldPath) => LookupResult;

/**
 * Mutable counter owned by exactly one MONO_INCR node
 */
export interface MonoIncrState {
  /** Value returned by the next evaluation */
  value: bigint;
}

/**
 * A compiled unit producing one fragment of a key
 */
export type Generator =
  | { kind: "text"; text: string }
  | { kind: "field"; path: FieldPath }
  | { kind: "monoIncr"; state: MonoIncrState }
  | { kind: "uuid" };

export type GeneratorKind = Generator["kind"];

/**
 * Options accepted by `compileKeyGenerator`
 */
export interface CompileOptions {
  /** Field resolver used by field references (default: `jsonLookup`) */
  lookup?: DocumentLookup;
}

/**
 * Delimiter configuration
 */
export interface KeyGenConfig {
  /** Character enclosing field references (default: "%") */
  fieldDelimiter: string;
  /** Character enclosing built-in generators (default: "#") */
  generatorDelimiter: string;
}
