import path from "path";
import { promises as fs } from "fs";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { SyncJournal, formatDate, formatTime } from "../../src/core/SyncJournal";
import { makeTempDir, removeTempDir } from "../helpers";

describe("SyncJournal", () => {
  let dir: string;
  // Local time, so the paths do not depend on the machine's time zone
  const morning = new Date(2026, 2, 1, 9, 5);

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it("formats dates and times", () => {
    expect(formatDate(morning)).toBe("2026-03-01");
    expect(formatTime(morning)).toBe("09:05");
  });

  it("files notes by year and month", () => {
    const journal = new SyncJournal(dir, () => morning);

    expect(journal.pathFor(morning)).toBe(path.join(dir, "2026", "03", "2026-03-01.md"));
  });

  it("creates the day's note and keeps entries above the tag", async () => {
    const journal = new SyncJournal(dir, () => morning);

    const filePath = await journal.append("### First\nbody\n");
    await journal.append("### Second");

    expect(await fs.readFile(filePath, "utf-8")).toBe(
      "# 2026-03-01 - Daily Log\n\n### First\nbody\n\n### Second\n\n#daily-log\n"
    );
  });

  it("appends to a note without the tag", async () => {
    const journal = new SyncJournal(dir, () => morning);
    const filePath = journal.pathFor(morning);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, "# Notes\n");

    await journal.append("### Sync");

    expect(await fs.readFile(filePath, "utf-8")).toBe("# Notes\n\n### Sync\n");
  });

  it("keeps dollar signs in entries as written", async () => {
    const journal = new SyncJournal(dir, () => morning);

    const filePath = await journal.append("  - Artist - $& Song");

    expect(await fs.readFile(filePath, "utf-8")).toContain("  - Artist - $& Song\n\n#daily-log");
  });
});
