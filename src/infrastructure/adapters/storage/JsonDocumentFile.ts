import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import type { Logger } from 'pino';

export type JsonDocument = Record<string, unknown>;

const JsonDocumentSchema = z.record(z.unknown());

// Checks the shape only: parsing through zod would rebuild the object and drop a `__proto__` key.
const isJsonDocument = (value: unknown): value is JsonDocument => JsonDocumentSchema.safeParse(value).success;

/** Sets `key` as an own property, so keys such as `__proto__` are stored like any other. */
export const setEntry = (document: JsonDocument, key: string, value: unknown): void => {
  Object.defineProperty(document, key, { value, enumerable: true, writable: true, configurable: true });
};

const hasErrorCode = (error: unknown, code: string): boolean =>
  error instanceof Error && 'code' in error && error.code === code;

/**
 * A flat JSON object kept in one file. Every read loads the whole document and
 * every write replaces it; there is no locking between concurrent writers.
 */
export class JsonDocumentFile {
  constructor(
    readonly filePath: string,
    private readonly logger: Logger,
  ) {}

  async read(): Promise<JsonDocument> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        this.logger.debug({ file: this.filePath }, 'document missing, reading as empty');
      } else {
        this.logger.warn({ file: this.filePath, err: error }, 'document unreadable, reading as empty');
      }
      return {};
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      this.logger.warn({ file: this.filePath, err: error }, 'document is not valid JSON, reading as empty');
      return {};
    }

    if (!isJsonDocument(parsed)) {
      this.logger.warn({ file: this.filePath }, 'document is not a JSON object, reading as empty');
      return {};
    }

    return parsed;
  }

  async write(document: JsonDocument): Promise<void> {
    await mkdir(path.dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, JSON.stringify(document, null, 2), 'utf8');
  }

  /** Writes `document` only when the file does not exist yet. Returns whether it wrote. */
  async createIfMissing(document: JsonDocument): Promise<boolean> {
    await mkdir(path.dirname(this.filePath), { recursive: true });
    try {
      await writeFile(this.filePath, JSON.stringify(document, null, 2), { encoding: 'utf8', flag: 'wx' });
      return true;
    } catch (error) {
      if (hasErrorCode(error, 'EEXIST')) {
        return false;
      }
      throw error;
    }
  }
}
