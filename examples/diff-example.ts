/**
 * Example: diffing two recordings to detect breaking changes
 *
 * Run from a directory holding `v1.json` and `v2.json` cassettes, or pass the
 * cassette directory as the first argument.
 */

import { CassetteDiff, CassetteStore } from "../src/index.js";

async function diffExample() {
  const store = CassetteStore.at(process.argv[2] ?? ".");
  const result = await CassetteDiff.compareStored(store, "v1", "v2");

  console.log("=== DIFF SUMMARY ===");
  console.log(`Total changes: ${result.summary.total_changes}`);
  console.log(`Breaking changes: ${result.summary.breaking_count}`);
  console.log(`Added: ${result.summary.added_count}`);
  console.log(`Removed: ${result.summary.removed_count}`);
  console.log(`Modified: ${result.summary.modified_count}`);

  for (const change of result.breaking_changes) {
    console.log(`\n  ${change.type} ${change.method}`);
    if (change.details) {
      console.log(`  Details: ${change.details}`);
    }
  }

  // Gate CI on breaking changes
  if (result.breaking_changes.length > 0) {
    process.exit(1);
  }
}

diffExample().catch((error) => {
  console.error("Error:", error);
  process.exit(1);
});
