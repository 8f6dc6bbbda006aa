import { StorageClient } from "./storage";
import { keys } from "./keys";
import { isRecord } from "./guards";
import { BUILTIN_EVENT_CLASSES } from "../types/pipeline";

/**
 * Print the archived detection reports of one identifier
 */
export async function checkDetections(
  storage: StorageClient,
  identifier: string,
  eventClasses: number[] = BUILTIN_EVENT_CLASSES.map((c) => c.code),
): Promise<number> {
  let found = 0;

  for (const eventClass of eventClasses) {
    const key = keys.detections(identifier, eventClass);
    console.log(`S3 key: ${key}`);

    if (!(await storage.exists(key))) {
      console.log(`  no report for class ${eventClass}`);
      continue;
    }

    const report = await storage.loadJson(key);
    const detections =
      isRecord(report) && Array.isArray(report.detections) ? report.detections : [];
    const title = isRecord(report) && typeof report.title === "string" ? report.title : "";

    console.log(`  ${title}: ${detections.length} detection(s) for class ${eventClass}`);
    found++;
  }

  return found;
}
