import { PGlite } from '@electric-sql/pglite';
import { drizzle } from 'drizzle-orm/pglite';
import { migrate } from 'drizzle-orm/pglite/migrator';
import { afterAll, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';
import { schema } from '@rgi-reader/backend/db';
import { createEmptyRecord } from './merge';
import { MIGRATIONS_FOLDER } from './migrations';
import { PgResultCache } from './pgCache';

const key = { checksum: '900150983cd24fb0d6963f7d28e17f72', model: 'gpt-4o', dpi: 240 };

const recordWithMatricula = (matricula: string) => {
  const record = createEmptyRecord();
  record.document_metadata.matricula = matricula;
  return record;
};

// In-process Postgres with the real migrations applied
describe('PgResultCache', () => {
  const client = new PGlite();
  const db = drizzle(client, { schema });
  const cache = new PgResultCache(db);

  beforeAll(async () => {
    await migrate(db, { migrationsFolder: MIGRATIONS_FOLDER });
  }, 30_000);

  afterAll(async () => {
    await client.close();
  });

  beforeEach(async () => {
    vi.restoreAllMocks();
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    await client.exec('DELETE FROM extraction_results');
  });

  it('stores a result and finds it by key and by code', async () => {
    const saved = await cache.save(key, { filename: 'matricula.pdf', pageCount: 3, record: recordWithMatricula('777') });

    if (!saved) {
      throw new Error('expected the result to be stored');
    }
    expect(saved.code).toMatch(/^[0-9A-Za-z]{8}$/);
    expect(saved).toMatchObject({ ...key, filename: 'matricula.pdf', pageCount: 3 });
    expect(saved.record.document_metadata.matricula).toBe('777');
    expect(saved.createdAt).toBeInstanceOf(Date);

    expect(await cache.find(key)).toEqual(saved);
    expect(await cache.findByCode(saved.code)).toEqual(saved);
  });

  it('misses for another model or DPI', async () => {
    await cache.save(key, { filename: null, pageCount: 1, record: createEmptyRecord() });

    expect(await cache.find({ ...key, model: 'gpt-5' })).toBeNull();
    expect(await cache.find({ ...key, dpi: 300 })).toBeNull();
    expect(await cache.findByCode('unknown1')).toBeNull();
  });

  it('updates the row in place when the same key is saved again', async () => {
    const first = await cache.save(key, { filename: 'a.pdf', pageCount: 1, record: recordWithMatricula('1') });
    const second = await cache.save(key, { filename: 'b.pdf', pageCount: 2, record: recordWithMatricula('2') });

    expect(second?.id).toBe(first?.id);
    expect(second?.code).toBe(first?.code);
    expect(await cache.find(key)).toMatchObject({ filename: 'b.pdf', pageCount: 2 });
  });

  it('deletes by code', async () => {
    const saved = await cache.save(key, { filename: null, pageCount: 1, record: createEmptyRecord() });
    if (!saved) {
      throw new Error('expected the result to be stored');
    }

    expect(await cache.deleteByCode(saved.code)).toBe(true);
    expect(await cache.findByCode(saved.code)).toBeNull();
    expect(await cache.deleteByCode(saved.code)).toBe(false);
  });
});

describe('PgResultCache without a working database', () => {
  const client = new PGlite();
  const cache = new PgResultCache(drizzle(client, { schema }));

  beforeAll(async () => {
    await client.waitReady;
    await client.close();
  }, 30_000);

  beforeEach(() => {
    vi.restoreAllMocks();
  });

  it('logs failures and answers as a miss', async () => {
    const logError = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    expect(await cache.find(key)).toBeNull();
    expect(await cache.save(key, { filename: null, pageCount: 1, record: createEmptyRecord() })).toBeNull();
    expect(await cache.findByCode('abcd1234')).toBeNull();
    expect(await cache.deleteByCode('abcd1234')).toBe(false);

    expect(logError.mock.calls.map(([message]) => message)).toEqual([
      '[Cache] Error getting extraction result:',
      '[Cache] Error caching extraction result:',
      '[Cache] Error getting result by code:',
      '[Cache] Error deleting result by code:',
    ]);
  });
});
