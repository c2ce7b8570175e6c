import path from "path";
import { promises as fs } from "fs";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { buildProgram, run } from "../src/cli";
import { makeTempDir, removeTempDir } from "./helpers";

describe("cli", () => {
  let dir: string;
  let printed: string[];

  beforeEach(async () => {
    dir = await makeTempDir();
    printed = [];
    vi.spyOn(console, "log").mockImplementation((line: unknown) => {
      printed.push(String(line));
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeTempDir(dir);
  });

  it("prints the checkpoint status", async () => {
    const checkpointFile = path.join(dir, "checkpoint.json");

    expect(await run({ status: true, checkpointFile })).toBe(0);
    expect(printed).toEqual([
      "📊 Transfer Status\n",
      `No checkpoint found at ${checkpointFile}`,
      "Nothing to resume.",
    ]);
  });

  it("deletes the checkpoint on reset", async () => {
    const checkpointFile = path.join(dir, "checkpoint.json");
    await fs.writeFile(checkpointFile, "{}");

    expect(await run({ reset: true, checkpointFile })).toBe(0);
    expect(printed).toEqual([`✅ Checkpoint ${checkpointFile} deleted`]);
    expect(await run({ reset: true, checkpointFile })).toBe(0);
    expect(printed[1]).toBe(`No checkpoint at ${checkpointFile}`);
  });

  it("exports an empty library as a header-only CSV", async () => {
    const exportFile = path.join(dir, "out", "unavailable.csv");

    expect(await run({ export: true, exportFile, libraryFile: path.join(dir, "library.csv") })).toBe(0);
    expect(await fs.readFile(exportFile, "utf-8")).toBe("artistName,trackName,albumName,sourceId,notes\n");
    expect(printed).toEqual([`✅ Exported 0 tracks to ${exportFile}`]);
  });

  it("rejects a batch size outside 1-100", async () => {
    const program = buildProgram()
      .exitOverride()
      .configureOutput({ writeErr: () => undefined });

    await expect(program.parseAsync(["--batch-size", "500"], { from: "user" })).rejects.toThrow(
      "Must be an integer between 1 and 100."
    );
  });
});
