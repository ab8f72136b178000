/**
 * Environment and configuration resolution
 *
 * KEYGEN_FIELD_DELIMITER / KEYGEN_GENERATOR_DELIMITER override the default "%" and "#".
 */

import { z } from "zod";
import { DelimiterError } from "./errors.js";
import { DEFAULT_FIELD_DELIMITER, DEFAULT_GENERATOR_DELIMITER, validateDelimiters } from "./keygen.js";
import type { KeyGenConfig } from "./types.js";

export const KeyGenConfigSchema = z
  .object({
    fieldDelimiter: z.string().default(DEFAULT_FIELD_DELIMITER),
    generatorDelimiter: z.string().default(DEFAULT_GENERATOR_DELIMITER),
  })
  .superRefine((config, ctx) => {
    try {
      validateDelimiters(config.fieldDelimiter, config.generatorDelimiter);
    } catch (error) {
      if (!(error instanceof DelimiterError)) {
        throw error;
      }
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: error.message,
      });
    }
  });

/**
 * Parse a partial configuration, filling in defaults
 * @throws DelimiterError if the delimiter pair is invalid
 */
export function parseConfig(input: Partial<KeyGenConfig> = {}): KeyGenConfig {
  const result = KeyGenConfigSchema.safeParse(input);
  if (!result.success) {
    const message = result.error.issues.map((issue) => issue.message).join("; ");
    throw new DelimiterError(message, { cause: result.error });
  }
  return result.data;
}

/**
 * Resolve the delimiter configuration
 * Priority: KEYGEN_* env vars > defaults
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): KeyGenConfig {
  return parseConfig({
    fieldDelimiter: env.KEYGEN_FIELD_DELIMITER,
    generatorDelimiter: env.KEYGEN_GENERATOR_DELIMITER,
  });
}

