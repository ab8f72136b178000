/**
 * Bulk Import Example
 *
 * Generates keys for a batch of documents and strips the key fields from each body.
 * Run with: npx tsx examples/bulk-import.ts
 */

import {
  compileKeyGenerator,
  generateKeys,
  loadConfig,
  removeFrom,
  summarizeKeyResults,
} from "@doc-keygen/sdk";

function main() {
  const { fieldDelimiter, generatorDelimiter } = loadConfig();

  const documents = [
    { user: { name: "alice" }, city: "Leeds" },
    { user: { name: "bob" }, city: "York" },
    { user: null, city: "Hull" },
  ];

  const f = fieldDelimiter;
  const g = generatorDelimiter;
  const generator = compileKeyGenerator(
    `user::${f}user.name${f}::${g}MONO_INCR[100]${g}`,
    fieldDelimiter,
    generatorDelimiter
  );

  const results = generateKeys(
    generator,
    documents.map((doc) => JSON.stringify(doc))
  );

  for (const result of results) {
    if (!result.ok) {
      console.log(`⚠️  Document ${result.index} skipped: ${result.error.reason}`);
      continue;
    }

    const doc = documents[result.index];
    if (!doc) continue;

    const body: Record<string, unknown> = structuredClone(doc);
    for (const path of generator.fieldPaths()) {
      removeFrom(path, body);
    }

    console.log(`✅ ${result.key.toString()} -> ${JSON.stringify(body)}`);
  }

  const summary = summarizeKeyResults(results);
  console.log(`\n📊 ${summary.generated}/${summary.total} keys generated, ${summary.skipped} skipped`);
}

main();
