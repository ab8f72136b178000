/**
 * Batch key generation for bulk imports
 *
 * A ResultError only condemns the document that caused it: it is recorded and logged, and the
 * remaining documents are still processed. Any other error aborts the batch.
 */

import { isResultError } from "./errors.js";
import type { ResultError } from "./errors.js";
import { formatFieldPath } from "./field-path.js";
import type { KeyGenerator } from "./keygen.js";
import { logger } from "./observability/logs.js";
import type { DocumentInput } from "./types.js";

export type KeyResult =
  | { ok: true; index: number; key: Buffer }
  | { ok: false; index: number; error: ResultError };

export interface KeyResultSummary {
  total: number;
  generated: number;
  skipped: number;
}

/**
 * Generate one key per document, in order
 * @param generator - Compiled key generator; MONO_INCR counters advance across the whole batch
 * @param documents - Document bodies
 * @returns One result per document, in input order
 */
export function generateKeys(
  generator: KeyGenerator,
  documents: Iterable<DocumentInput>
): KeyResult[] {
  const results: KeyResult[] = [];
  let index = 0;

  for (const document of documents) {
    try {
      results.push({ ok: true, index, key: generator.next(document) });
    } catch (error) {
      if (!isResultError(error)) {
        throw error;
      }

      logger.warn("keygen.document.skipped", {
        expression: generator.expression,
        field: error.field && formatFieldPath(error.field),
        message: error.reason,
        details: { index },
      });
      results.push({ ok: false, index, error });
    }

    index++;
  }

  return results;
}

export function summarizeKeyResults(results: readonly KeyResult[]): KeyResultSummary {
  const generated = results.filter((r) => r.ok).length;
  return { total: results.length, generated, skipped: results.length - generated };
}
