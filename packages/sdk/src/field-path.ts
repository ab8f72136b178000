/**
 * Field path grammar
 *
 * Syntax rules:
 * 1. Nested fields are separated using a '.' character
 * 2. '`' characters quote an exact string, so a quoted segment may contain '.'
 * 3. A doubled '``' represents a single literal '`', inside or outside quotes
 *
 * Examples:
 * - 'key' -> ['key']
 * - 'nested.key' -> ['nested', 'key']
 * - '`not.a.nested`.key' -> ['not.a.nested', 'key']
 * - '```.key`' -> ['`.key']
 * - '```.key.```' -> ['`.key.`']
 */

import { FieldPathError } from "./errors.js";
import { peek } from "./scan.js";
import type { FieldPath } from "./types.js";

const BACKTICK = "`";
const PERIOD = ".";

interface Step {
  /** Characters emitted into the current segment */
  char: string;
  /** Characters consumed from the input; 0 ends the segment */
  consumed: number;
  /** Whether a quoted segment is open after this step */
  open: boolean;
}

/**
 * Parse a field reference (e.g. "parent.child") into its nested segments
 * @throws FieldPathError if the path is malformed
 */
export function parseFieldPath(path: string): FieldPath {
  if (path.length === 0) {
    throw new FieldPathError("field path is empty");
  }

  if (path[0] === PERIOD) {
    throw new FieldPathError("cannot find nested object of field without name");
  }

  const fields: string[] = [];
  let index = 0;

  while (index < path.length) {
    const [field, consumed] = parseSegment(path, index);
    fields.push(field);
    index += consumed;
  }

  return fields;
}

/**
 * Parse one segment starting at `start`. Returns the segment and the number of characters consumed,
 * including the separating period.
 */
function parseSegment(path: string, start: number): [string, number] {
  let index = start;
  let open = false;
  let field = "";

  while (index < path.length) {
    const step: Step = open ? parseOpen(path, index) : parseNotOpen(path, index);
    open = step.open;

    if (step.consumed === 0) {
      break;
    }

    field += step.char;
    index += step.consumed;
  }

  if (open) {
    throw new FieldPathError("unbalanced backticks");
  }

  return [field, index - start + 1];
}

function parseOpen(path: string, index: number): Step {
  const char = path.charAt(index);

  if (char !== BACKTICK) {
    return { char, consumed: 1, open: true };
  }

  // Escaped backtick, stay inside the quotes
  if (peek(path, index) === BACKTICK) {
    return { char: BACKTICK, consumed: 2, open: true };
  }

  // Closing backtick
  return { char: "", consumed: 1, open: false };
}

function parseNotOpen(path: string, index: number): Step {
  const char = path.charAt(index);

  switch (char) {
    case PERIOD:
      if (index === 0 || path[index - 1] === PERIOD) {
        throw new FieldPathError("empty field name");
      }

      // End of this segment; the caller skips the period
      return { char: "", consumed: 0, open: false };
    case BACKTICK:
      if (peek(path, index) === BACKTICK) {
        return { char: BACKTICK, consumed: 2, open: false };
      }

      // Opening backtick
      return { char: "", consumed: 1, open: true };
    default:
      return { char, consumed: 1, open: false };
  }
}

/**
 * Render a field path back into the grammar accepted by `parseFieldPath`
 * @throws FieldPathError if a segment is empty, which the grammar cannot express
 */
export function formatFieldPath(path: FieldPath): string {
  return path
    .map((segment) => {
      if (segment.length === 0) {
        throw new FieldPathError("cannot format an empty field name");
      }

      const escaped = segment.replaceAll(BACKTICK, BACKTICK + BACKTICK);
      return segment.includes(PERIOD) ? `${BACKTICK}${escaped}${BACKTICK}` : escaped;
    })
    .join(PERIOD);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Remove the field at `path` from a decoded document. Missing or non-object intermediate levels
 * leave the document untouched.
 */
export function removeFrom(path: FieldPath, object: Record<string, unknown>): void {
  const last = path[path.length - 1];
  if (last === undefined) {
    return;
  }

  let current = object;

  for (const key of path.slice(0, -1)) {
    const value = Object.hasOwn(current, key) ? current[key] : undefined;
    if (!isPlainObject(value)) {
      return;
    }

    current = value;
  }

  delete current[last];
}
