import { drizzle, type PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema';

export type Database = PostgresJsDatabase<typeof schema>;

/**
 * Singleton database connection
 */
let dbInstance: Database | null = null;
let sqlClient: ReturnType<typeof postgres> | null = null;

/**
 * Get the Drizzle database instance
 * Creates the connection on first call
 */
export const getDb = (databaseUrl: string): Database => {
  if (dbInstance) {
    return dbInstance;
  }

  // Create postgres.js client for Drizzle
  sqlClient = postgres(databaseUrl, {
    max: 10, // Connection pool size
    idle_timeout: 20,
    connect_timeout: 10,
  });

  dbInstance = drizzle(sqlClient, { schema });

  return dbInstance;
};

/**
 * Close database connection
 * Call this on server shutdown
 */
export const closeDb = async (): Promise<void> => {
  if (sqlClient) {
    await sqlClient.end();
    sqlClient = null;
    dbInstance = null;
  }
};

// Re-export schema for convenience
export { schema };
