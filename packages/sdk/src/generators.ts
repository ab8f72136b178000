/**
 * Generator parsing and evaluation
 *
 * Each parser receives the remainder of the expression plus the offset of that remainder within
 * the full expression, so errors can report positions in the original input.
 */

import { randomUUID } from "node:crypto";
import { ExpressionError, ResultError } from "./errors.js";
import { parseFieldPath } from "./field-path.js";
import { peek, startAtEndReason, unescape } from "./scan.js";
import type { DocumentInput, DocumentLookup, Generator } from "./types.js";

/**
 * A parsed generator and the number of characters its body consumed
 */
export interface ParsedGenerator {
  generator: Generator;
  consumed: number;
}

/**
 * Matches `MONO_INCR` and `MONO_INCR[N]`
 */
const MONO_INCR_PATTERN = /^MONO_INCR(?:\[(-?\d+)\])?$/;

// Largest unsigned 64-bit value
const MAX_MONO_INCR_START = 2n ** 64n - 1n;

const UUID_TOKEN = "UUID";

/**
 * Parse a field reference body (the text after the opening delimiter)
 * @param body - Expression remainder starting just after the opening delimiter
 * @param offset - Position of `body` within the full expression
 */
export function parseField(body: string, offset: number, fieldDelimiter: string): ParsedGenerator {
  let index = 0;

  while (index < body.length) {
    if (body[index] !== fieldDelimiter) {
      index++;
      continue;
    }

    // Escaped field delimiter, jump over both characters
    if (peek(body, index) === fieldDelimiter) {
      index += 2;
      continue;
    }

    const path = parseFieldPath(unescape(body.slice(0, index), fieldDelimiter));
    return { generator: { kind: "field", path }, consumed: index };
  }

  throw new ExpressionError(offset + index, "unclosed field at end of expression");
}

/**
 * Parse a built-in generator body (the text after the opening delimiter)
 */
export function parseGenerator(
  body: string,
  offset: number,
  fieldDelimiter: string,
  generatorDelimiter: string
): ParsedGenerator {
  let index = 0;
  let closed = false;

  while (index < body.length) {
    const char = body[index];

    if (char === generatorDelimiter) {
      closed = true;
      break;
    }

    if (char === fieldDelimiter) {
      throw new ExpressionError(offset + index, "attempting to start a field inside a generator");
    }

    index++;
  }

  if (!closed) {
    throw new ExpressionError(offset + index, "unclosed generator at end of expression");
  }

  const token = body.slice(0, index);

  const monoIncr = parseMonoIncr(token, offset);
  if (monoIncr) {
    return { generator: monoIncr, consumed: index };
  }

  if (token === UUID_TOKEN) {
    return { generator: { kind: "uuid" }, consumed: index };
  }

  throw new ExpressionError(offset, "invalid generator");
}

/**
 * Parse a MONO_INCR token, returning undefined if the token is some other generator.
 * A missing, zero or negative start normalizes to 1; starts above 2^64-1 are rejected.
 */
export function parseMonoIncr(token: string, offset: number): Generator | undefined {
  const match = MONO_INCR_PATTERN.exec(token);
  if (!match) {
    return undefined;
  }

  const raw = match[1];
  if (raw === undefined) {
    return { kind: "monoIncr", state: { value: 1n } };
  }

  const start = BigInt(raw);
  if (start > MAX_MONO_INCR_START) {
    throw new ExpressionError(offset, `invalid MONO_INCR start point '${raw}'`);
  }

  return { kind: "monoIncr", state: { value: start > 0n ? start : 1n } };
}

/**
 * Parse a run of static text, un-escaping doubled delimiters
 */
export function parseText(
  rest: string,
  offset: number,
  fieldDelimiter: string,
  generatorDelimiter: string
): ParsedGenerator {
  let index = 0;
  let end = 0;

  while (index < rest.length) {
    const char = rest.charAt(index);

    if (char !== fieldDelimiter && char !== generatorDelimiter) {
      index++;
      end = index;
      continue;
    }

    const next = peek(rest, index);
    if (next === undefined) {
      throw new ExpressionError(offset + index + 1, startAtEndReason(char, generatorDelimiter));
    }

    if (next !== char) {
      break;
    }

    index += 2;
    end = index;
  }

  const text = unescape(rest.slice(0, end), fieldDelimiter, generatorDelimiter);
  return { generator: { kind: "text", text }, consumed: end };
}

/**
 * Produce the next key fragment for a generator. MONO_INCR nodes are advanced in place.
 * @throws ResultError if a referenced field cannot be used in a key
 */
export function nextFragment(
  generator: Generator,
  document: DocumentInput,
  lookup: DocumentLookup
): string {
  switch (generator.kind) {
    case "text":
      return generator.text;
    case "field": {
      const result = lookup(document, generator.path);
      switch (result.kind) {
        case "absent":
          throw new ResultError("resulting field does not exist", { field: generator.path });
        case "null":
          throw new ResultError("resulting field is null", { field: generator.path });
        case "array":
        case "object":
          throw new ResultError("resulting field is a JSON array/object", { field: generator.path });
        case "scalar":
          return result.value;
        default:
          return assertNever(result);
      }
    }
    case "monoIncr": {
      const value = generator.state.value;
      generator.state.value = value + 1n;
      return value.toString();
    }
    case "uuid":
      return randomUUID();
    default:
      return assertNever(generator);
  }
}

function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}
