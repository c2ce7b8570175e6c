import { promises as fs } from "fs";
import { dirname, basename, join } from "path";

/**
 * Writes `contents` next to `filePath` under a temporary name, then renames
 * it over the destination. Readers see either the old file or the new one.
 */
export async function writeFileAtomic(
  filePath: string,
  contents: string
): Promise<void> {
  const dir = dirname(filePath) || ".";
  const tempPath = join(
    dir,
    `.${basename(filePath)}.${process.pid}.${Date.now()}.tmp`
  );

  await fs.mkdir(dir, { recursive: true });

  try {
    const handle = await fs.open(tempPath, "w");
    try {
      await handle.writeFile(contents, "utf-8");
      await handle.sync();
    } finally {
      await handle.close();
    }
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

/** Resolves to null when the file does not exist */
export async function readFileIfExists(
  filePath: string
): Promise<string | null> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (error) {
    if (isMissingFileError(error)) {
      return null;
    }
    throw error;
  }
}

export async function removeFileIfExists(filePath: string): Promise<boolean> {
  try {
    await fs.unlink(filePath);
    return true;
  } catch (error) {
    if (isMissingFileError(error)) {
      return false;
    }
    throw error;
  }
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
