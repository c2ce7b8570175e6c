import path from "path";
import winston from "winston";
import { Logger } from "../utils/Logger";
import { readFileIfExists, writeFileAtomic } from "../utils/AtomicFile";
import { PersistenceError, describeError } from "./Errors";

const JOURNAL_TAG = "#daily-log";

const pad = (value: number) => value.toString().padStart(2, "0");

export const formatDate = (date: Date): string =>
  `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;

export const formatTime = (date: Date): string =>
  `${pad(date.getHours())}:${pad(date.getMinutes())}`;

/**
 * Daily markdown notes under `<root>/YYYY/MM/YYYY-MM-DD.md`. Entries go just
 * above the `#daily-log` tag when the note has one, at the end otherwise.
 */
export class SyncJournal {
  private readonly logger: winston.Logger;

  constructor(
    private readonly rootDir: string,
    private readonly now: () => Date = () => new Date()
  ) {
    this.logger = Logger.getInstance();
  }

  pathFor(date: Date): string {
    return path.join(
      this.rootDir,
      String(date.getFullYear()),
      pad(date.getMonth() + 1),
      `${formatDate(date)}.md`
    );
  }

  async append(entry: string): Promise<string> {
    const date = this.now();
    const filePath = this.pathFor(date);

    try {
      const existing =
        (await readFileIfExists(filePath)) ??
        `# ${formatDate(date)} - Daily Log\n\n${JOURNAL_TAG}\n`;

      const content = existing.includes(JOURNAL_TAG)
        ? existing.replace(JOURNAL_TAG, () => `${entry.trim()}\n\n${JOURNAL_TAG}`)
        : `${existing}\n${entry.trim()}\n`;

      await writeFileAtomic(filePath, content);
    } catch (error) {
      throw new PersistenceError(
        `Could not update journal ${filePath}: ${describeError(error)}`,
        filePath,
        error
      );
    }

    this.logger.info(`📝 Logged sync to ${filePath}`);
    return filePath;
  }
}
