import { mkdir, readFile, rename, stat, writeFile } from "node:fs/promises";
import path from "node:path";

import { createLogger } from "../logger.js";

const log = createLogger("json-document");

export interface JsonDocumentOptions<T> {
  /** Value written when the file is missing or unrecoverable. */
  empty: () => T;
  /** Returns the decoded value, or null when the parsed JSON has the wrong shape. */
  decode: (value: unknown) => T | null;
}

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

/**
 * One JSON file on disk. Writes go to a temp file and are renamed into place,
 * keeping the previous version as `.bak`; a file that is missing or fails to
 * parse is restored from that backup, else reset to the empty value. Callers
 * provide their own locking.
 */
export class JsonDocument<T> {
  constructor(
    readonly filePath: string,
    private readonly options: JsonDocumentOptions<T>,
  ) {}

  async ensure(): Promise<void> {
    try {
      await stat(this.filePath);
    } catch (error) {
      if (!isMissingFile(error)) throw error;
      await mkdir(path.dirname(this.filePath), { recursive: true });
      const backup = await this.readBackup();
      if (backup !== null) log.warn("JSON document missing, restored from backup", { file: this.filePath });
      await this.atomicWrite(backup ?? this.options.empty());
    }
  }

  async read(): Promise<T> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf8");
    } catch (error) {
      if (!isMissingFile(error)) throw error;
      return this.tryRecover();
    }

    const decoded = this.decodeRaw(raw);
    if (decoded !== null) return decoded;
    return this.tryRecover();
  }

  async write(value: T): Promise<void> {
    await this.atomicWrite(value);
  }

  private decodeRaw(raw: string): T | null {
    try {
      return this.options.decode(JSON.parse(raw));
    } catch {
      return null;
    }
  }

  private async readBackup(): Promise<T | null> {
    try {
      return this.decodeRaw(await readFile(`${this.filePath}.bak`, "utf8"));
    } catch (error) {
      if (!isMissingFile(error)) throw error;
      return null;
    }
  }

  private async tryRecover(): Promise<T> {
    log.warn("JSON document unreadable, trying backup", { file: this.filePath });
    const backup = await this.readBackup();
    if (backup !== null) {
      await mkdir(path.dirname(this.filePath), { recursive: true });
      await this.atomicWrite(backup);
      return backup;
    }
    log.warn("Backup unusable, resetting JSON document", { file: this.filePath });
    return this.resetToEmpty();
  }

  private async resetToEmpty(): Promise<T> {
    const value = this.options.empty();
    await mkdir(path.dirname(this.filePath), { recursive: true });
    await this.atomicWrite(value);
    return value;
  }

  private async atomicWrite(value: T): Promise<void> {
    const tmpPath = `${this.filePath}.tmp`;
    const bakPath = `${this.filePath}.bak`;
    const serialized = `${JSON.stringify(value, null, 2)}\n`;

    await writeFile(tmpPath, serialized, "utf8");

    // With no current file the existing backup stays; it may be the only copy.
    let hasCurrent = true;
    try {
      await stat(this.filePath);
    } catch (error) {
      if (!isMissingFile(error)) throw error;
      hasCurrent = false;
    }
    if (hasCurrent) await rename(this.filePath, bakPath);

    await rename(tmpPath, this.filePath);
  }
}

/** Decoder for JSON arrays that keeps only the entries passing `guard`. */
export const arrayOf =
  <T>(guard: (value: unknown) => value is T) =>
  (value: unknown): T[] | null =>
    Array.isArray(value) ? value.filter(guard) : null;
