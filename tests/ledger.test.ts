import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import { promises as fs } from "fs";
import path from "path";
import { LedgerWriteError } from "../src/lib/errors";
import { Ledger, formatCsvRow, parseCsv } from "../src/lib/ledger";
import { makeTempDir, silenceLogs } from "./fakes";

const ID = "abcDEF12345";
const WATCH = `https://www.youtube.com/watch?v=${ID}`;
const fixedNow = () => new Date("2026-03-01T12:00:00.000Z");

describe("ledger", () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    silenceLogs();
    dir = await makeTempDir();
    file = path.join(dir, "inference_log.csv");
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("treats a missing ledger as empty", async () => {
    const snapshot = await new Ledger(file).readSnapshot();
    expect(snapshot.isLogged(ID)).toBe(false);
  });

  it("appends quoted CSV rows", async () => {
    const ledger = new Ledger(file, fixedNow);

    const entry = await ledger.append({
      reference: WATCH,
      eventClass: 60,
      title: 'Title, with "quotes"',
    });

    expect(entry.identifier).toBe(ID);
    expect(await fs.readFile(file, "utf-8")).toBe(
      `${WATCH},60,2026-03-01T12:00:00.000Z,"Title, with ""quotes"""\r\n`,
    );
  });

  it("reads back appended entries per identifier and class", async () => {
    const ledger = new Ledger(file, fixedNow);
    await ledger.append({ reference: WATCH, eventClass: 60, title: "First" });
    await ledger.append({ reference: `https://youtu.be/${ID}`, eventClass: 58, title: "Second" });
    await ledger.append({ reference: "https://example.com/a.mp3", eventClass: 60, title: "" });

    const snapshot = await ledger.readSnapshot();

    expect(snapshot.isLoggedFor(ID, 60)).toBe(true);
    expect(snapshot.isLoggedFor(ID, 58)).toBe(true);
    expect(snapshot.loggedClasses(ID)).toEqual([60, 58]);
    expect(snapshot.latestTitle(ID)).toBe("Second");
    expect(snapshot.isLogged("https://example.com/a.mp3")).toBe(true);
    expect(snapshot.latestTitle("https://example.com/a.mp3")).toBeNull();
  });

  it("skips malformed rows", async () => {
    await fs.writeFile(file, `${WATCH},60,2026-01-01T00:00:00.000Z,Ok\nbroken,row-without-code\n\n`);
    const snapshot = await new Ledger(file).readSnapshot();
    expect(snapshot.loggedClasses(ID)).toEqual([60]);
    expect(snapshot.isLogged("broken")).toBe(false);
  });

  it("raises LedgerWriteError when the ledger cannot be written", async () => {
    const ledger = new Ledger(path.join(dir, "missing", "inference_log.csv"));
    await expect(ledger.append({ reference: WATCH, eventClass: 60, title: "t" })).rejects.toBeInstanceOf(
      LedgerWriteError,
    );
  });

  describe("csv", () => {
    it("quotes only when needed", () => {
      expect(formatCsvRow(["a", "b c", "d,e"])).toBe('a,b c,"d,e"\r\n');
    });

    it("parses quoted fields with separators and newlines", () => {
      expect(parseCsv('a,"b,""c""\nd",e\r\nf,g,h\n')).toEqual([
        ["a", 'b,"c"\nd', "e"],
        ["f", "g", "h"],
      ]);
    });
  });
});
