import { mkdirSync } from 'fs'
import { dirname } from 'path'
import { createDrizzleDb, getRawDb, DrizzleDB } from './client'

/**
 * DDL matching ./schema.ts. Applied on every open; every statement is
 * idempotent.
 */
const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS users (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    chat_user_id TEXT NOT NULL UNIQUE,
    username TEXT,
    first_name TEXT,
    last_name TEXT,
    timezone TEXT NOT NULL DEFAULT 'UTC',
    notification_time TEXT NOT NULL DEFAULT '09:00',
    notification_enabled INTEGER NOT NULL DEFAULT 1,
    created_at INTEGER NOT NULL,
    last_active INTEGER NOT NULL
  );

  CREATE TABLE IF NOT EXISTS books (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
    title TEXT NOT NULL,
    author TEXT,
    file_path TEXT,
    file_type TEXT,
    total_chapters INTEGER NOT NULL DEFAULT 0,
    processed_chapters INTEGER NOT NULL DEFAULT 0,
    processing_status TEXT NOT NULL DEFAULT 'pending',
    word_count INTEGER,
    reading_time_minutes INTEGER,
    complexity_score REAL,
    structure TEXT,
    processing_log TEXT,
    created_at INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_books_user ON books(user_id);
  CREATE INDEX IF NOT EXISTS idx_books_status ON books(processing_status);

  CREATE TABLE IF NOT EXISTS chapters (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    book_id INTEGER NOT NULL REFERENCES books(id) ON DELETE CASCADE,
    chapter_number INTEGER NOT NULL,
    title TEXT NOT NULL,
    content TEXT NOT NULL,
    word_count INTEGER NOT NULL DEFAULT 0,
    position_percentage REAL NOT NULL,
    estimated_reading_time INTEGER NOT NULL,
    start_offset INTEGER NOT NULL,
    end_offset INTEGER NOT NULL,
    sections TEXT NOT NULL,
    processing_status TEXT NOT NULL DEFAULT 'pending',
    CONSTRAINT chapters_book_number UNIQUE (book_id, chapter_number)
  );
  CREATE INDEX IF NOT EXISTS idx_chapters_book ON chapters(book_id);

  CREATE TABLE IF NOT EXISTS chapter_analyses (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    chapter_id INTEGER NOT NULL REFERENCES chapters(id) ON DELETE CASCADE,
    summary TEXT NOT NULL,
    key_concepts TEXT NOT NULL,
    main_arguments TEXT NOT NULL,
    terminology TEXT NOT NULL,
    important_quotes TEXT NOT NULL,
    model TEXT NOT NULL,
    created_at INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_analyses_chapter ON chapter_analyses(chapter_id);

  CREATE TABLE IF NOT EXISTS book_syntheses (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    book_id INTEGER NOT NULL REFERENCES books(id) ON DELETE CASCADE,
    summary_short TEXT NOT NULL,
    summary_detailed TEXT NOT NULL,
    key_themes TEXT NOT NULL,
    concept_hierarchy TEXT NOT NULL,
    model TEXT NOT NULL,
    created_at INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_syntheses_book ON book_syntheses(book_id);

  CREATE TABLE IF NOT EXISTS learning_materials (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    book_id INTEGER NOT NULL REFERENCES books(id) ON DELETE CASCADE,
    interval_type TEXT NOT NULL,
    content TEXT NOT NULL,
    created_at INTEGER NOT NULL,
    CONSTRAINT learning_materials_book_interval UNIQUE (book_id, interval_type)
  );
`

/**
 * Create and initialize a database connection
 * @param path - Path to SQLite database file (or ':memory:')
 */
export function createDatabase(path: string): DrizzleDB {
  // Ensure parent directory exists (especially important for CI/test environments)
  if (path !== ':memory:') {
    mkdirSync(dirname(path), { recursive: true })
  }

  const db = createDrizzleDb(path)

  // Initialize schema (creates tables if they don't exist)
  getRawDb(db).exec(SCHEMA_SQL)

  return db
}
