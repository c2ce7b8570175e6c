import os from "os";
import path from "path";
import { promises as fs } from "fs";

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "playlist-porter-"));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export const fixedClock = (iso: string) => () => new Date(iso);
