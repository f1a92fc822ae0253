import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { PersistenceException } from '../common/exceptions/persistence.exception';
import { JsonFileStore } from './json-file.store';

interface Row {
  id: string;
  value: number;
}

describe('JsonFileStore', () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'json-store-'));
    file = join(dir, 'nested', 'rows.json');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('creates an empty collection file on first load', async () => {
    const store = new JsonFileStore<Row>(file, 'rows');

    await expect(store.load()).resolves.toEqual([]);
    expect(JSON.parse(readFileSync(file, 'utf-8'))).toEqual({ rows: [] });
  });

  it('writes two-space indented JSON and keeps other top-level keys', async () => {
    const flat = join(dir, 'rows.json');
    writeFileSync(flat, JSON.stringify({ meta: { version: 2 }, rows: [] }));
    const store = new JsonFileStore<Row>(flat, 'rows');

    await store.save([{ id: 'a', value: 1 }]);

    const raw = readFileSync(flat, 'utf-8');
    expect(raw).toBe(
      `${JSON.stringify({ meta: { version: 2 }, rows: [{ id: 'a', value: 1 }] }, null, 2)}\n`,
    );
  });

  it('serializes concurrent updates so no write is lost', async () => {
    const store = new JsonFileStore<Row>(file, 'rows');

    await Promise.all(
      Array.from({ length: 20 }, (_, i) =>
        store.update((rows) => {
          rows.push({ id: `r${i}`, value: i });
        }),
      ),
    );

    const rows = await store.load();
    expect(rows).toHaveLength(20);
    expect(rows.map((r) => r.id)).toEqual(Array.from({ length: 20 }, (_, i) => `r${i}`));
  });

  it('keeps a write that races the first read of a missing file', async () => {
    const store = new JsonFileStore<Row>(file, 'rows');

    const [loaded] = await Promise.all([
      store.load(),
      store.update((rows) => {
        rows.push({ id: 'a', value: 1 });
      }),
      store.load(),
    ]);

    expect(loaded).toEqual([]);
    expect(JSON.parse(readFileSync(file, 'utf-8'))).toEqual({ rows: [{ id: 'a', value: 1 }] });
  });

  it('returns the mutation result and keeps working after a failed mutation', async () => {
    const store = new JsonFileStore<Row>(file, 'rows');

    await expect(
      store.update(() => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    const size = await store.update((rows) => {
      rows.push({ id: 'x', value: 7 });
      return rows.length;
    });

    expect(size).toBe(1);
    await expect(store.load()).resolves.toEqual([{ id: 'x', value: 7 }]);
  });

  it('rejects a file that is not valid JSON and leaves it untouched', async () => {
    const flat = join(dir, 'broken.json');
    writeFileSync(flat, '{ "rows": [');
    const store = new JsonFileStore<Row>(flat, 'rows');

    await expect(store.load()).rejects.toBeInstanceOf(PersistenceException);
    expect(readFileSync(flat, 'utf-8')).toBe('{ "rows": [');
  });

  it('rejects a collection that is not an array', async () => {
    const flat = join(dir, 'object.json');
    writeFileSync(flat, JSON.stringify({ rows: { id: 'a' } }));
    const store = new JsonFileStore<Row>(flat, 'rows');

    await expect(store.load()).rejects.toMatchObject({
      filePath: flat,
      response: expect.objectContaining({ code: 'STORAGE_CORRUPTED' }),
    });
  });
});
