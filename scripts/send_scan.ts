import { inngest, SCAN_BATCH_EVENT, ScanBatchEvent } from "../src/inngest/client";
import * as dotenv from "dotenv";

dotenv.config();

const POLICIES: Record<string, ScanBatchEvent["data"]["policy"]> = {
  all: "PROCESS_ALL",
  new: "SKIP_LOGGED_PROCESS_NEW",
  missing: "REDOWNLOAD_LOGGED_MISSING",
};

/**
 * Queue a batch scan on the Inngest runner
 * Usage: npm run send-scan -- <policy> <source...>
 * Example: npm run send-scan -- new links.txt
 */
async function main() {
  const [policyArg, ...sources] = process.argv.slice(2);
  const policy = policyArg ? POLICIES[policyArg] : undefined;

  if (!policy || sources.length === 0) {
    console.error("Error: a policy (all, new or missing) and at least one source are required");
    console.log("Usage: npm run send-scan -- <policy> <source...>");
    console.log("Example: npm run send-scan -- new links.txt");
    process.exit(1);
  }

  const data: ScanBatchEvent["data"] = {
    sources,
    policy,
    requested_by: "cli",
  };

  console.log("Sending event to Inngest:");
  console.log(JSON.stringify(data, null, 2));

  try {
    const result = await inngest.send({ name: SCAN_BATCH_EVENT, data });
    console.log("\nEvent sent successfully!");
    console.log("Event ID:", result.ids[0]);
  } catch (error) {
    console.error("Failed to send event:", error);
    console.error("\nMake sure the Inngest Dev Server and `npm run dev` are running");
    process.exit(1);
  }
}

main().catch((error) => {
  console.error("Unexpected error:", error);
  process.exit(1);
});
