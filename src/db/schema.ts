import {
  sqliteTable,
  text,
  integer,
  real,
  index,
  unique,
} from "drizzle-orm/sqlite-core";
import { relations } from "drizzle-orm";
import type {
  BookStructure,
  ConceptNode,
  LearningMaterialContent,
  ProcessingLogEntry,
  TableOfContentsEntry,
} from "../core/types";

// ============================================================================
// USERS
// ============================================================================

export const users = sqliteTable(
  "users",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    chatUserId: text("chat_user_id").notNull().unique(),
    username: text("username"),
    firstName: text("first_name"),
    lastName: text("last_name"),
    timezone: text("timezone").notNull().default("UTC"),
    notificationTime: text("notification_time").notNull().default("09:00"),
    notificationEnabled: integer("notification_enabled", { mode: "boolean" })
      .notNull()
      .default(true),
    createdAt: integer("created_at", { mode: "timestamp_ms" }).notNull(),
    lastActive: integer("last_active", { mode: "timestamp_ms" }).notNull(),
  }
);

// ============================================================================
// BOOKS & CHAPTERS
// ============================================================================

export const PROCESSING_STATUSES = [
  "pending",
  "processing",
  "completed",
  "error",
] as const;

export const books = sqliteTable(
  "books",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    userId: integer("user_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    title: text("title").notNull(),
    author: text("author"),
    filePath: text("file_path"),
    fileType: text("file_type"),
    totalChapters: integer("total_chapters").notNull().default(0),
    processedChapters: integer("processed_chapters").notNull().default(0),
    processingStatus: text("processing_status", { enum: PROCESSING_STATUSES })
      .notNull()
      .default("pending"),
    wordCount: integer("word_count"),
    readingTimeMinutes: integer("reading_time_minutes"),
    complexityScore: real("complexity_score"),
    structure: text("structure", { mode: "json" }).$type<BookStructure>(),
    processingLog: text("processing_log", { mode: "json" }).$type<
      ProcessingLogEntry[]
    >(),
    createdAt: integer("created_at", { mode: "timestamp_ms" }).notNull(),
  },
  (table) => ({
    userIdx: index("idx_books_user").on(table.userId),
    statusIdx: index("idx_books_status").on(table.processingStatus),
  })
);

export const chapters = sqliteTable(
  "chapters",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    bookId: integer("book_id")
      .notNull()
      .references(() => books.id, { onDelete: "cascade" }),
    chapterNumber: integer("chapter_number").notNull(),
    title: text("title").notNull(),
    content: text("content").notNull(),
    wordCount: integer("word_count").notNull().default(0),
    positionPercentage: real("position_percentage").notNull(),
    estimatedReadingTime: integer("estimated_reading_time").notNull(),
    startOffset: integer("start_offset").notNull(),
    endOffset: integer("end_offset").notNull(),
    sections: text("sections", { mode: "json" })
      .$type<TableOfContentsEntry[]>()
      .notNull(),
    processingStatus: text("processing_status", { enum: PROCESSING_STATUSES })
      .notNull()
      .default("pending"),
  },
  (table) => ({
    bookIdx: index("idx_chapters_book").on(table.bookId),
    numberUnique: unique("chapters_book_number").on(
      table.bookId,
      table.chapterNumber
    ),
  })
);

// ============================================================================
// ANALYSIS OUTPUTS
// ============================================================================

export const chapterAnalyses = sqliteTable(
  "chapter_analyses",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    chapterId: integer("chapter_id")
      .notNull()
      .references(() => chapters.id, { onDelete: "cascade" }),
    summary: text("summary").notNull(),
    keyConcepts: text("key_concepts", { mode: "json" })
      .$type<string[]>()
      .notNull(),
    mainArguments: text("main_arguments", { mode: "json" })
      .$type<string[]>()
      .notNull(),
    terminology: text("terminology", { mode: "json" })
      .$type<string[]>()
      .notNull(),
    importantQuotes: text("important_quotes", { mode: "json" })
      .$type<string[]>()
      .notNull(),
    model: text("model").notNull(),
    createdAt: integer("created_at", { mode: "timestamp_ms" }).notNull(),
  },
  (table) => ({
    chapterIdx: index("idx_analyses_chapter").on(table.chapterId),
  })
);

export const bookSyntheses = sqliteTable(
  "book_syntheses",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    bookId: integer("book_id")
      .notNull()
      .references(() => books.id, { onDelete: "cascade" }),
    summaryShort: text("summary_short").notNull(),
    summaryDetailed: text("summary_detailed").notNull(),
    keyThemes: text("key_themes", { mode: "json" }).$type<string[]>().notNull(),
    conceptHierarchy: text("concept_hierarchy", { mode: "json" })
      .$type<ConceptNode[]>()
      .notNull(),
    model: text("model").notNull(),
    createdAt: integer("created_at", { mode: "timestamp_ms" }).notNull(),
  },
  (table) => ({
    bookIdx: index("idx_syntheses_book").on(table.bookId),
  })
);

// ============================================================================
// LEARNING MATERIALS (one per spaced-repetition interval)
// ============================================================================

export const INTERVAL_TYPES = ["day1", "day3", "day7", "day30"] as const;

export const learningMaterials = sqliteTable(
  "learning_materials",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    bookId: integer("book_id")
      .notNull()
      .references(() => books.id, { onDelete: "cascade" }),
    intervalType: text("interval_type", { enum: INTERVAL_TYPES }).notNull(),
    content: text("content", { mode: "json" })
      .$type<LearningMaterialContent>()
      .notNull(),
    createdAt: integer("created_at", { mode: "timestamp_ms" }).notNull(),
  },
  (table) => ({
    intervalUnique: unique("learning_materials_book_interval").on(
      table.bookId,
      table.intervalType
    ),
  })
);

// ============================================================================
// RELATIONS (for relational queries)
// ============================================================================

export const usersRelations = relations(users, ({ many }) => ({
  books: many(books),
}));

export const booksRelations = relations(books, ({ one, many }) => ({
  user: one(users, {
    fields: [books.userId],
    references: [users.id],
  }),
  chapters: many(chapters),
  syntheses: many(bookSyntheses),
  learningMaterials: many(learningMaterials),
}));

export const chaptersRelations = relations(chapters, ({ one, many }) => ({
  book: one(books, {
    fields: [chapters.bookId],
    references: [books.id],
  }),
  analyses: many(chapterAnalyses),
}));

export const chapterAnalysesRelations = relations(
  chapterAnalyses,
  ({ one }) => ({
    chapter: one(chapters, {
      fields: [chapterAnalyses.chapterId],
      references: [chapters.id],
    }),
  })
);

export const bookSynthesesRelations = relations(bookSyntheses, ({ one }) => ({
  book: one(books, {
    fields: [bookSyntheses.bookId],
    references: [books.id],
  }),
}));

export const learningMaterialsRelations = relations(
  learningMaterials,
  ({ one }) => ({
    book: one(books, {
      fields: [learningMaterials.bookId],
      references: [books.id],
    }),
  })
);

// ============================================================================
// TYPE INFERENCE (automatically generated from schema)
// ============================================================================

// Select types (reading from DB)
export type User = typeof users.$inferSelect;
export type Book = typeof books.$inferSelect;
export type Chapter = typeof chapters.$inferSelect;
export type ChapterAnalysisRow = typeof chapterAnalyses.$inferSelect;
export type BookSynthesisRow = typeof bookSyntheses.$inferSelect;
export type LearningMaterial = typeof learningMaterials.$inferSelect;

// Insert types (writing to DB)
export type UserInsert = typeof users.$inferInsert;
export type BookInsert = typeof books.$inferInsert;
export type ChapterInsert = typeof chapters.$inferInsert;
export type ChapterAnalysisInsert = typeof chapterAnalyses.$inferInsert;
export type BookSynthesisInsert = typeof bookSyntheses.$inferInsert;
export type LearningMaterialInsert = typeof learningMaterials.$inferInsert;
