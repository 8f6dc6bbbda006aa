/**
 * Append-only processing ledger
 *
 * CSV rows: reference, event class code, processed-at (ISO-8601), title.
 * Identifiers are derived from the reference column on read, so rows written
 * with any URL variant of an item count for the same identifier.
 */

import { promises as fs } from "fs";
import type { FileHandle } from "fs/promises";
import { LedgerWriteError, errorMessage, isMissingFile } from "./errors";
import { extractIdentifier } from "./identifiers";
import { LedgerEntry } from "../types/pipeline";

interface LedgerItem {
  classes: number[];
  title: string;
}

export class LedgerSnapshot {
  private items = new Map<string, LedgerItem>();

  constructor(entries: LedgerEntry[]) {
    for (const entry of entries) {
      const item = this.items.get(entry.identifier) ?? { classes: [], title: "" };
      if (!item.classes.includes(entry.eventClass)) {
        item.classes.push(entry.eventClass);
      }
      item.title = entry.title || item.title;
      this.items.set(entry.identifier, item);
    }
  }

  static empty(): LedgerSnapshot {
    return new LedgerSnapshot([]);
  }

  isLogged(identifier: string): boolean {
    return this.items.has(identifier);
  }

  isLoggedFor(identifier: string, eventClass: number): boolean {
    return this.items.get(identifier)?.classes.includes(eventClass) ?? false;
  }

  loggedClasses(identifier: string): number[] {
    return [...(this.items.get(identifier)?.classes ?? [])];
  }

  latestTitle(identifier: string): string | null {
    const title = this.items.get(identifier)?.title;
    return title ? title : null;
  }
}

export interface AppendRequest {
  reference: string;
  eventClass: number;
  title: string;
}

export class Ledger {
  constructor(
    readonly filePath: string,
    private now: () => Date = () => new Date(),
  ) {}

  async readSnapshot(): Promise<LedgerSnapshot> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) {
        console.log(
          JSON.stringify({
            scope: "ledger",
            action: "ledger_not_found",
            path: this.filePath,
          }),
        );
        return LedgerSnapshot.empty();
      }
      throw error;
    }

    const entries: LedgerEntry[] = [];
    let skipped = 0;
    for (const row of parseCsv(raw)) {
      const [reference, code, processedAt = "", title = ""] = row;
      const eventClass = Number(code);
      if (!reference || !Number.isInteger(eventClass)) {
        skipped++;
        continue;
      }
      entries.push({
        identifier: extractIdentifier(reference),
        reference,
        eventClass,
        processedAt,
        title,
      });
    }

    console.log(
      JSON.stringify({
        scope: "ledger",
        action: "snapshot_loaded",
        path: this.filePath,
        entries: entries.length,
        skipped_rows: skipped,
      }),
    );

    return new LedgerSnapshot(entries);
  }

  /**
   * Append one entry and flush it to disk before returning
   */
  async append(request: AppendRequest): Promise<LedgerEntry> {
    const entry: LedgerEntry = {
      identifier: extractIdentifier(request.reference),
      reference: request.reference,
      eventClass: request.eventClass,
      processedAt: this.now().toISOString(),
      title: request.title,
    };

    const line = formatCsvRow([
      entry.reference,
      String(entry.eventClass),
      entry.processedAt,
      entry.title,
    ]);

    let handle: FileHandle | undefined;
    try {
      handle = await fs.open(this.filePath, "a");
      await handle.appendFile(line, "utf-8");
      await handle.sync();
    } catch (error) {
      console.error(
        JSON.stringify({
          scope: "ledger",
          action: "append_error",
          error_type: "ledger_write",
          path: this.filePath,
          identifier: entry.identifier,
          error: errorMessage(error),
        }),
      );
      throw new LedgerWriteError(
        `Failed to append to ledger ${this.filePath}: ${errorMessage(error)}`,
        this.filePath,
        error,
      );
    } finally {
      await handle?.close();
    }

    return entry;
  }
}

export function formatCsvRow(fields: string[]): string {
  return (
    fields
      .map((field) =>
        /[",\r\n]/.test(field) ? `"${field.replace(/"/g, '""')}"` : field,
      )
      .join(",") + "\r\n"
  );
}

/**
 * Parse RFC 4180 CSV (quoted fields may contain commas, quotes and newlines)
 */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = "";
  let quoted = false;
  let i = 0;

  while (i < text.length) {
    const ch = text[i];

    if (quoted) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i += 2;
          continue;
        }
        quoted = false;
      } else {
        field += ch;
      }
      i++;
      continue;
    }

    if (ch === '"' && field === "") {
      quoted = true;
    } else if (ch === ",") {
      row.push(field);
      field = "";
    } else if (ch === "\n" || ch === "\r") {
      row.push(field);
      field = "";
      if (row.some((value) => value !== "")) {
        rows.push(row);
      }
      row = [];
      if (ch === "\r" && text[i + 1] === "\n") {
        i++;
      }
    } else {
      field += ch;
    }
    i++;
  }

  row.push(field);
  if (row.some((value) => value !== "")) {
    rows.push(row);
  }
  return rows;
}
