import { and, eq } from 'drizzle-orm';
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import { schema } from '@rgi-reader/backend/db';
import {
  generateShortCode,
  type CachedExtraction,
  type CacheEntryInput,
  type ExtractionCacheKey,
  type ResultCache,
} from '@rgi-reader/backend/services/cache';

type ExtractionRow = typeof schema.extractionResults.$inferSelect;

/**
 * Any drizzle Postgres database over the app schema (postgres.js in production)
 */
export type CacheDatabase = PgDatabase<PgQueryResultHKT, typeof schema>;

const rowToCached = (row: ExtractionRow): CachedExtraction => ({
  id: row.id,
  code: row.shortCode,
  checksum: row.checksum,
  model: row.model,
  dpi: row.dpi,
  filename: row.filename,
  pageCount: row.pageCount,
  record: row.record,
  createdAt: row.createdAt,
});

/**
 * Postgres-backed cache, used when DATABASE_URL is set
 *
 * Database failures are logged and treated as misses, so extraction keeps
 * working while the database is unavailable.
 */
export class PgResultCache implements ResultCache {
  constructor(private readonly db: CacheDatabase) {}

  async find(key: ExtractionCacheKey): Promise<CachedExtraction | null> {
    try {
      const rows = await this.db
        .select()
        .from(schema.extractionResults)
        .where(
          and(
            eq(schema.extractionResults.checksum, key.checksum),
            eq(schema.extractionResults.model, key.model),
            eq(schema.extractionResults.dpi, key.dpi),
          ),
        )
        .limit(1);

      if (rows.length === 0) {
        return null;
      }

      console.log(`[Cache] Extraction cache hit: ${key.checksum.substring(0, 8)}... (${key.model}, ${key.dpi} DPI)`);
      return rowToCached(rows[0]);
    } catch (error) {
      console.error('[Cache] Error getting extraction result:', error);
      return null;
    }
  }

  async save(key: ExtractionCacheKey, entry: CacheEntryInput): Promise<CachedExtraction | null> {
    try {
      const rows = await this.db
        .insert(schema.extractionResults)
        .values({
          checksum: key.checksum,
          model: key.model,
          dpi: key.dpi,
          filename: entry.filename,
          pageCount: entry.pageCount,
          record: entry.record,
          shortCode: generateShortCode(),
        })
        .onConflictDoUpdate({
          target: [
            schema.extractionResults.checksum,
            schema.extractionResults.model,
            schema.extractionResults.dpi,
          ],
          set: {
            filename: entry.filename,
            pageCount: entry.pageCount,
            record: entry.record,
            createdAt: new Date(),
          },
        })
        .returning();

      if (rows.length === 0) {
        console.error('[Cache] Error caching extraction result: no result returned');
        return null;
      }

      console.log(`[Cache] Extraction cached: ${key.checksum.substring(0, 8)}... (code: ${rows[0].shortCode})`);
      return rowToCached(rows[0]);
    } catch (error) {
      console.error('[Cache] Error caching extraction result:', error);
      return null;
    }
  }

  async findByCode(code: string): Promise<CachedExtraction | null> {
    try {
      const rows = await this.db
        .select()
        .from(schema.extractionResults)
        .where(eq(schema.extractionResults.shortCode, code))
        .limit(1);

      return rows.length > 0 ? rowToCached(rows[0]) : null;
    } catch (error) {
      console.error('[Cache] Error getting result by code:', error);
      return null;
    }
  }

  async deleteByCode(code: string): Promise<boolean> {
    try {
      const rows = await this.db
        .delete(schema.extractionResults)
        .where(eq(schema.extractionResults.shortCode, code))
        .returning({ id: schema.extractionResults.id });

      return rows.length > 0;
    } catch (error) {
      console.error('[Cache] Error deleting result by code:', error);
      return false;
    }
  }
}
