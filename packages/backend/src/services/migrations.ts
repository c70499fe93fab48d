import { fileURLToPath } from 'node:url';
import { migrate } from 'drizzle-orm/postgres-js/migrator';
import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';

/**
 * SQL migration files, generated with: npm run db:generate --workspace @rgi-reader/backend
 */
export const MIGRATIONS_FOLDER = fileURLToPath(new URL('../../drizzle', import.meta.url));

/**
 * Run database migrations on startup
 * Uses Drizzle ORM's migration runner to apply SQL migration files
 *
 * @param databaseUrl - Connection string, or null when the database cache is disabled
 */
export const runMigrations = async (databaseUrl: string | null): Promise<void> => {
  if (!databaseUrl) {
    console.log('[Migrations] DATABASE_URL not configured, skipping migrations');
    console.log('[Migrations] Results will be cached in memory only');
    return;
  }

  console.log('[Migrations] Running database migrations...');

  // Create a dedicated connection for migrations
  const migrationClient = postgres(databaseUrl, {
    max: 1,
  });

  const db = drizzle(migrationClient);

  try {
    await migrate(db, {
      migrationsFolder: MIGRATIONS_FOLDER,
    });
    console.log('[Migrations] All migrations completed successfully');
  } catch (error) {
    console.error('[Migrations] Migration failed:', error);
    throw error;
  } finally {
    await migrationClient.end();
  }
};
