import Database from 'better-sqlite3'
import { drizzle, BetterSQLite3Database } from 'drizzle-orm/better-sqlite3'
import * as schema from './schema'

export type DrizzleDB = BetterSQLite3Database<typeof schema> & {
  $client: Database.Database
}

/**
 * Create a Drizzle-wrapped database instance
 * @param dbPath - Path to the SQLite database file (or ':memory:' for in-memory)
 * @returns Drizzle database instance with type-safe queries
 */
export function createDrizzleDb(dbPath: string): DrizzleDB {
  const sqlite = new Database(dbPath)
  if (dbPath !== ':memory:') {
    sqlite.pragma('journal_mode = WAL')
  }
  sqlite.pragma('foreign_keys = ON')

  return drizzle(sqlite, { schema })
}

/**
 * Get the raw better-sqlite3 instance from a Drizzle database
 * Useful for operations not supported by Drizzle (DDL, pragmas, etc.)
 * @param db - Drizzle database instance
 * @returns Raw better-sqlite3 Database instance
 */
export function getRawDb(db: DrizzleDB): Database.Database {
  return db.$client
}

/**
 * Close the underlying SQLite connection
 */
export function closeDatabase(db: DrizzleDB): void {
  db.$client.close()
}
