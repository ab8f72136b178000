/**
 * Key generator compiler and pipeline
 *
 * The following examples use the default delimiters and the document below:
 *
 *   {
 *     "key": "value1",
 *     "nested": { "key": "value2", "with.dot": "value3" }
 *   }
 *
 * Generators:
 * - '#MONO_INCR#' -> '1', '2' ...; '#MONO_INCR[100]#' -> '100', '101' ...
 * - '#UUID#' -> '67a7f0a4-99a5-4607-b275-c3b436250ad2' ...
 * - 'example' -> 'example'
 * - '%key%' -> 'value1'; '%nested.key%' -> 'value2'; '%nested.`with.dot`%' -> 'value3'
 *
 * Combined: 'key::#UUID#::#MONO_INCR[50]#::%key%' -> 'key::d9c64d00-...::50::value1'
 */

import { DelimiterError, EmptyExpressionError, ResultError } from "./errors.js";
import { formatFieldPath } from "./field-path.js";
import { nextFragment, parseField, parseGenerator, parseText } from "./generators.js";
import type { ParsedGenerator } from "./generators.js";
import { jsonLookup } from "./lookup.js";
import { logger } from "./observability/logs.js";
import { shouldParse } from "./scan.js";
import type { CompileOptions, DocumentInput, DocumentLookup, FieldPath, Generator } from "./types.js";

/**
 * Maximum size of a generated key in bytes; longer keys are rejected, never truncated
 */
export const MAX_KEY_SIZE = 250;

export const DEFAULT_FIELD_DELIMITER = "%";
export const DEFAULT_GENERATOR_DELIMITER = "#";

/**
 * Validate a field/generator delimiter pair
 * @throws DelimiterError describing the first rule violated
 */
export function validateDelimiters(fieldDelimiter: string, generatorDelimiter: string): void {
  if (fieldDelimiter === "") {
    throw new DelimiterError("field delimiter can not be the empty string");
  }

  if (generatorDelimiter === "") {
    throw new DelimiterError("generator delimiter can not be the empty string");
  }

  if (fieldDelimiter.length > 1) {
    throw new DelimiterError("field delimiter must be a single character");
  }

  if (generatorDelimiter.length > 1) {
    throw new DelimiterError("generator delimiter must be a single character");
  }

  if (fieldDelimiter === "." || generatorDelimiter === ".") {
    throw new DelimiterError("cannot use . as a field or generator delimiter");
  }

  if (fieldDelimiter === "`" || generatorDelimiter === "`") {
    throw new DelimiterError("cannot use ` as a field or generator delimiter");
  }

  if (fieldDelimiter === generatorDelimiter) {
    throw new DelimiterError("field delimiter and generator delimiter can not be the same");
  }
}

/**
 * A compiled expression: an ordered list of generators evaluated in turn for each document.
 *
 * MONO_INCR generators keep their counter inside the pipeline, so one instance must not be shared
 * by callers that could interleave `next` calls without serializing them.
 */
export class KeyGenerator {
  readonly #generators: readonly Generator[];
  readonly #lookup: DocumentLookup;

  /**
   * @param expression - Source expression, kept for logging
   */
  constructor(
    readonly expression: string,
    generators: readonly Generator[],
    lookup: DocumentLookup = jsonLookup
  ) {
    this.#generators = generators;
    this.#lookup = lookup;
  }

  /**
   * Number of generators in the pipeline
   */
  get size(): number {
    return this.#generators.length;
  }

  /**
   * Paths of every field referenced by the expression, in expression order
   */
  fieldPaths(): FieldPath[] {
    const paths: FieldPath[] = [];
    for (const generator of this.#generators) {
      if (generator.kind === "field") {
        paths.push(generator.path);
      }
    }
    return paths;
  }

  /**
   * Generate the key for a document
   * @throws ResultError if a field cannot be used or the key is empty or too large
   */
  next(document: DocumentInput): Buffer {
    let key = "";

    for (const generator of this.#generators) {
      key += nextFragment(generator, document, this.#lookup);
    }

    const buffer = Buffer.from(key, "utf8");

    if (buffer.length === 0) {
      throw new ResultError("generated key is an empty string");
    }

    if (buffer.length > MAX_KEY_SIZE) {
      throw new ResultError(`generated key is larger than ${MAX_KEY_SIZE} bytes`);
    }

    return buffer;
  }

  /**
   * Generate the key for a document as a string
   */
  nextString(document: DocumentInput): string {
    return this.next(document).toString("utf8");
  }
}

/**
 * Compile an expression into a key generator
 * @param expression - Key expression, e.g. "user::%name%::#MONO_INCR#"
 * @param fieldDelimiter - Character enclosing field references (default: "%")
 * @param generatorDelimiter - Character enclosing built-in generators (default: "#")
 * @throws DelimiterError, ExpressionError or FieldPathError
 */
export function compileKeyGenerator(
  expression: string,
  fieldDelimiter = DEFAULT_FIELD_DELIMITER,
  generatorDelimiter = DEFAULT_GENERATOR_DELIMITER,
  options: CompileOptions = {}
): KeyGenerator {
  validateDelimiters(fieldDelimiter, generatorDelimiter);

  if (expression === "") {
    throw new EmptyExpressionError();
  }

  const generators: Generator[] = [];
  let index = 0;

  while (index < expression.length) {
    const { generator, consumed } = parseNext(expression, index, fieldDelimiter, generatorDelimiter);
    generators.push(generator);
    index += consumed;
  }

  const keyGenerator = new KeyGenerator(expression, generators, options.lookup);

  logger.debug("keygen.compile", {
    expression,
    details: {
      generators: generators.map((g) => g.kind),
      fields: keyGenerator.fieldPaths().map(formatFieldPath),
    },
  });

  return keyGenerator;
}

/**
 * Parse the generator starting at `index`. The consumed count includes any enclosing delimiters.
 */
function parseNext(
  expression: string,
  index: number,
  fieldDelimiter: string,
  generatorDelimiter: string
): ParsedGenerator {
  if (shouldParse(expression, index, fieldDelimiter)) {
    const parsed = parseField(expression.slice(index + 1), index + 1, fieldDelimiter);
    return { generator: parsed.generator, consumed: parsed.consumed + 2 };
  }

  if (shouldParse(expression, index, generatorDelimiter)) {
    const parsed = parseGenerator(
      expression.slice(index + 1),
      index + 1,
      fieldDelimiter,
      generatorDelimiter
    );
    return { generator: parsed.generator, consumed: parsed.consumed + 2 };
  }

  return parseText(expression.slice(index), index, fieldDelimiter, generatorDelimiter);
}
