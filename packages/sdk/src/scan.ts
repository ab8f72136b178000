/**
 * Character-level scanning helpers shared by the expression and field path parsers
 */

/**
 * Return the character following `index`, or undefined at the end of the input
 */
export function peek(input: string, index: number): string | undefined {
  return index + 1 < input.length ? input[index + 1] : undefined;
}

/**
 * Whether a field/generator using `delimiter` starts at `index`. A doubled delimiter is an escape,
 * and a delimiter in the final position cannot start anything.
 */
export function shouldParse(expression: string, index: number, delimiter: string): boolean {
  const next = peek(expression, index);
  return next !== undefined && expression[index] === delimiter && next !== delimiter;
}

/**
 * Reverse the escaping of each delimiter ("%%" -> "%")
 */
export function unescape(text: string, ...delimiters: string[]): string {
  let out = text;
  for (const delimiter of delimiters) {
    out = out.replaceAll(delimiter + delimiter, delimiter);
  }
  return out;
}

/**
 * Reason used when a field/generator is opened by the last character of an expression
 */
export function startAtEndReason(current: string, generatorDelimiter: string): string {
  if (current === generatorDelimiter) {
    return "start of generator at end of expression";
  }

  return "start of field at end of expression";
}
