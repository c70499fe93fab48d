import { pgTable, uuid, varchar, integer, timestamp, jsonb, unique, index } from 'drizzle-orm/pg-core';
import type { MatriculaRecord } from '@rgi-reader/shared';

/**
 * Table: extraction_results
 * One record per PDF checksum + model + DPI, addressable by short code
 */
export const extractionResults = pgTable('extraction_results', {
  id: uuid('id').primaryKey().defaultRandom(),
  checksum: varchar('checksum', { length: 32 }).notNull(),
  model: varchar('model', { length: 64 }).notNull(),
  dpi: integer('dpi').notNull(),
  filename: varchar('filename', { length: 255 }),
  pageCount: integer('page_count').notNull(),
  record: jsonb('record').$type<MatriculaRecord>().notNull(),
  shortCode: varchar('short_code', { length: 12 }).notNull().unique(),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
}, (table) => [
  unique('extraction_checksum_model_dpi_unique').on(table.checksum, table.model, table.dpi),
  index('idx_extraction_results_code').on(table.shortCode),
]);
