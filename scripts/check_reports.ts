#!/usr/bin/env tsx
/**
 * Show archived detection reports for an identifier
 * Usage: tsx scripts/check_reports.ts <identifier> [class...]
 */

import * as dotenv from "dotenv";
import { checkDetections } from "../src/lib/check-utils";
import { getStorageClient } from "../src/lib/storage";

dotenv.config();

async function main() {
  const [identifier, ...classArgs] = process.argv.slice(2);
  if (!identifier) {
    console.error("Usage: tsx scripts/check_reports.ts <identifier> [class...]");
    process.exit(1);
  }

  const storage = getStorageClient();
  if (!storage) {
    console.error("REPORT_BUCKET_NAME is not set");
    process.exit(1);
  }

  const classes = classArgs.map(Number).filter(Number.isInteger);
  const found = await checkDetections(
    storage,
    identifier,
    classes.length ? classes : undefined,
  );
  console.log(`\n${found} report(s) found`);
}

main().catch((error) => {
  console.error("Unexpected error:", error);
  process.exit(1);
});
