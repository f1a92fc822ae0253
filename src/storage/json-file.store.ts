import { Logger } from '@nestjs/common';
import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { v4 as uuidv4 } from 'uuid';
import { PersistenceException } from '../common/exceptions/persistence.exception';
import { StorageErrors } from '../common/errors/storage.errors';
import { Store } from './store';

type JsonDocument = Record<string, unknown>;

function isPlainObject(value: unknown): value is JsonDocument {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// fs errors may come from another realm (e.g. under jest), so no instanceof Error
function isNodeError(err: unknown): err is NodeJS.ErrnoException {
  return typeof err === 'object' && err !== null && 'code' in err;
}

/**
 * Keeps a collection as `{ "<collection>": [...] }` in a single JSON file.
 * Every read parses the whole file and every write replaces it.
 */
export class JsonFileStore<T> implements Store<T> {
  private readonly logger = new Logger(JsonFileStore.name);
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    readonly location: string,
    private readonly collection: string,
  ) {}

  load(): Promise<T[]> {
    return this.enqueue(async () => this.extractRecords(await this.readDocument()));
  }

  save(records: T[]): Promise<void> {
    return this.enqueue(async () => {
      const document = await this.readDocument();
      await this.writeDocument({ ...document, [this.collection]: records });
    });
  }

  update<R>(mutate: (records: T[]) => R | Promise<R>): Promise<R> {
    return this.enqueue(async () => {
      const document = await this.readDocument();
      const records = this.extractRecords(document);
      const result = await mutate(records);
      await this.writeDocument({ ...document, [this.collection]: records });
      return result;
    });
  }

  /** Reads create the file when missing, so they share the write queue. */
  private enqueue<R>(run: () => Promise<R>): Promise<R> {
    const next = this.queue.then(run, run);
    // keep the chain alive after a failed operation
    this.queue = next.catch(() => undefined);
    return next;
  }

  private extractRecords(document: JsonDocument): T[] {
    const records = document[this.collection];
    if (records === undefined) {
      return [];
    }
    if (!Array.isArray(records)) {
      this.logger.error(
        `collection_not_array | file=${this.location} | collection=${this.collection}`,
      );
      throw new PersistenceException(StorageErrors.STORAGE_CORRUPTED, this.location);
    }
    return records;
  }

  private async readDocument(): Promise<JsonDocument> {
    let raw: string;
    try {
      raw = await readFile(this.location, 'utf-8');
    } catch (err) {
      if (isNodeError(err) && err.code === 'ENOENT') {
        const empty = { [this.collection]: [] };
        await this.writeDocument(empty);
        this.logger.log(`Created new data file: ${this.location}`);
        return empty;
      }
      this.logger.error(`read_failed | file=${this.location} | ${String(err)}`);
      throw new PersistenceException(StorageErrors.STORAGE_READ_FAILED, this.location, err);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      this.logger.error(`invalid_json | file=${this.location} | ${String(err)}`);
      throw new PersistenceException(StorageErrors.STORAGE_CORRUPTED, this.location, err);
    }

    if (!isPlainObject(parsed)) {
      this.logger.error(`invalid_document | file=${this.location}`);
      throw new PersistenceException(StorageErrors.STORAGE_CORRUPTED, this.location);
    }
    return parsed;
  }

  private async writeDocument(document: JsonDocument): Promise<void> {
    const tempPath = `${this.location}.${uuidv4()}.tmp`;
    try {
      await mkdir(dirname(this.location), { recursive: true });
      await writeFile(tempPath, `${JSON.stringify(document, null, 2)}\n`, 'utf-8');
      await rename(tempPath, this.location);
    } catch (err) {
      this.logger.error(`write_failed | file=${this.location} | ${String(err)}`);
      throw new PersistenceException(StorageErrors.STORAGE_WRITE_FAILED, this.location, err);
    }
  }
}
