import { and, asc, desc, eq } from "drizzle-orm";
import { DrizzleDB } from "../db/client";
import {
  books,
  chapters,
  chapterAnalyses,
  bookSyntheses,
  learningMaterials,
  type Book,
  type Chapter,
  type LearningMaterial,
} from "../db/schema";
import type {
  BookStructure,
  BookSynthesis,
  ChapterAnalysis,
  IntervalType,
} from "../core/types";

/**
 * Create a book entry without a file (manual /add).
 */
export function createBook(
  db: DrizzleDB,
  userId: number,
  title: string,
  author?: string
): Book {
  return db
    .insert(books)
    .values({
      userId,
      title,
      author: author ?? null,
      processingStatus: "pending",
      createdAt: new Date(),
    })
    .returning()
    .get();
}

/**
 * Get all books for a user, oldest first.
 */
export function getUserBooks(db: DrizzleDB, userId: number): Book[] {
  return db
    .select()
    .from(books)
    .where(eq(books.userId, userId))
    .orderBy(asc(books.id))
    .all();
}

/**
 * Get a book by ID.
 * Pass `userId` to only return the book if that user owns it.
 */
export function getBook(
  db: DrizzleDB,
  bookId: number,
  userId?: number
): Book | null {
  const condition =
    userId === undefined
      ? eq(books.id, bookId)
      : and(eq(books.id, bookId), eq(books.userId, userId));

  return db.select().from(books).where(condition).get() ?? null;
}

/**
 * Get all chapters for a book in reading order.
 */
export function getBookChapters(db: DrizzleDB, bookId: number): Chapter[] {
  return db
    .select()
    .from(chapters)
    .where(eq(chapters.bookId, bookId))
    .orderBy(asc(chapters.chapterNumber))
    .all();
}

export function getBookStructure(
  db: DrizzleDB,
  bookId: number
): BookStructure | null {
  const row = db
    .select({ structure: books.structure })
    .from(books)
    .where(eq(books.id, bookId))
    .get();

  return row?.structure ?? null;
}

/**
 * Latest synthesis for a book.
 */
export function getBookSynthesis(
  db: DrizzleDB,
  bookId: number
): BookSynthesis | null {
  const row = db
    .select()
    .from(bookSyntheses)
    .where(eq(bookSyntheses.bookId, bookId))
    .orderBy(desc(bookSyntheses.id))
    .limit(1)
    .get();

  if (!row) return null;

  return {
    summaryShort: row.summaryShort,
    summaryDetailed: row.summaryDetailed,
    keyThemes: row.keyThemes,
    conceptHierarchy: row.conceptHierarchy,
  };
}

/**
 * Chapter analyses for a book, ordered by chapter number.
 */
export function getChapterAnalyses(
  db: DrizzleDB,
  bookId: number
): Array<ChapterAnalysis & { chapterNumber: number; title: string }> {
  const rows = db
    .select({
      chapterNumber: chapters.chapterNumber,
      title: chapters.title,
      summary: chapterAnalyses.summary,
      keyConcepts: chapterAnalyses.keyConcepts,
      mainArguments: chapterAnalyses.mainArguments,
      terminology: chapterAnalyses.terminology,
      importantQuotes: chapterAnalyses.importantQuotes,
    })
    .from(chapterAnalyses)
    .innerJoin(chapters, eq(chapterAnalyses.chapterId, chapters.id))
    .where(eq(chapters.bookId, bookId))
    .orderBy(asc(chapters.chapterNumber))
    .all();

  return rows;
}

export function getLearningMaterial(
  db: DrizzleDB,
  bookId: number,
  interval: IntervalType
): LearningMaterial | null {
  return (
    db
      .select()
      .from(learningMaterials)
      .where(
        and(
          eq(learningMaterials.bookId, bookId),
          eq(learningMaterials.intervalType, interval)
        )
      )
      .get() ?? null
  );
}
