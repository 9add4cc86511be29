import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { existsSync, mkdtempSync, readFileSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { createDatabase } from "../../src/factories";
import { closeDatabase, type DrizzleDB } from "../../src/db/client";
import { BookProcessor } from "../../src/services/book-processor";
import { BookTextExtractor } from "../../src/parsers/text-extractor";
import { MockBookAnalyzer } from "../../src/mocks";
import { createUser } from "../../src/api/users";
import {
  getBook,
  getBookChapters,
  getBookSynthesis,
  getChapterAnalyses,
  getLearningMaterial,
  getUserBooks,
} from "../../src/api/books";
import type { ProcessingLogEntry } from "../../src/core/types";

const BOOK_TEXT =
  "The Quiet Garden\nBy Mara Stone\n\nChapter 1: Seeds\nEvery garden starts small.\n\nChapter 2: Roots\nRoots hold the soil.\n";

describe("BookProcessor", () => {
  let db: DrizzleDB;
  let booksDir: string;
  let analyzer: MockBookAnalyzer;
  let onError: ReturnType<typeof vi.fn>;
  let progress: ProcessingLogEntry[];
  let userId: number;

  function createProcessor(withAnalyzer = true, concurrency = 2): BookProcessor {
    return new BookProcessor(
      db,
      new BookTextExtractor({ onError: vi.fn() }),
      withAnalyzer ? analyzer : null,
      {
        booksDir,
        concurrency,
        onProgress: (entry) => progress.push(entry),
        onError,
      }
    );
  }

  function upload(fileName: string, text: string) {
    return {
      userId,
      userKey: "3001",
      fileName,
      content: Buffer.from(text, "utf-8"),
    };
  }

  beforeEach(() => {
    db = createDatabase(":memory:");
    booksDir = mkdtempSync(join(tmpdir(), "book-processor-"));
    analyzer = new MockBookAnalyzer();
    onError = vi.fn();
    progress = [];
    userId = createUser(db, { chatUserId: "3001" }).id;
  });

  afterEach(() => {
    closeDatabase(db);
    rmSync(booksDir, { recursive: true, force: true });
  });

  describe("processUpload", () => {
    it("should process a book end to end", async () => {
      const result = await createProcessor().processUpload(
        upload("garden.txt", BOOK_TEXT)
      );

      expect(result).not.toBeNull();
      expect(result).toMatchObject({
        title: "The Quiet Garden",
        author: "Mara Stone",
        chapterCount: 2,
      });
      expect(onError).not.toHaveBeenCalled();

      const bookId = result?.bookId ?? -1;
      const book = getBook(db, bookId);
      expect(book).toMatchObject({
        title: "The Quiet Garden",
        author: "Mara Stone",
        fileType: ".txt",
        processingStatus: "completed",
        totalChapters: 2,
        processedChapters: 2,
        wordCount: 20,
        readingTimeMinutes: 1,
      });
      expect(book?.structure?.headings).toHaveLength(2);
    });

    it("should store the uploaded file under the user's directory", async () => {
      const result = await createProcessor().processUpload(
        upload("garden.txt", BOOK_TEXT)
      );

      const filePath = join(booksDir, "3001", "garden.txt");
      expect(existsSync(filePath)).toBe(true);
      expect(readFileSync(filePath, "utf-8")).toBe(BOOK_TEXT);
      expect(getBook(db, result?.bookId ?? -1)?.filePath).toBe(filePath);
    });

    it("should store chapters with position and reading time", async () => {
      const result = await createProcessor().processUpload(
        upload("garden.txt", BOOK_TEXT)
      );

      const chapters = getBookChapters(db, result?.bookId ?? -1);

      expect(
        chapters.map((c) => [c.chapterNumber, c.title, c.positionPercentage])
      ).toEqual([
        [1, "Seeds", 0],
        [2, "Roots", 50],
      ]);
      expect(chapters[0].content).toBe(
        "Chapter 1: Seeds\nEvery garden starts small.\n\n"
      );
      expect(chapters[0].wordCount).toBe(7);
      expect(chapters[0].estimatedReadingTime).toBe(1);
      expect(chapters.every((c) => c.processingStatus === "completed")).toBe(true);
    });

    it("should analyze every chapter and build learning material", async () => {
      const result = await createProcessor().processUpload(
        upload("garden.txt", BOOK_TEXT)
      );
      const bookId = result?.bookId ?? -1;

      expect([...analyzer.chapterCalls].sort()).toEqual(["Roots", "Seeds"]);
      expect(analyzer.synthesisCalls).toBe(1);
      expect(analyzer.materialCalls).toEqual(["day1", "day3", "day7", "day30"]);

      expect(getChapterAnalyses(db, bookId).map((a) => a.summary)).toEqual([
        "This is a mock summary of chapter 'Seeds'.",
        "This is a mock summary of chapter 'Roots'.",
      ]);
      expect(getBookSynthesis(db, bookId)?.summaryShort).toBe(
        "This is a mock summary of 'The Quiet Garden'."
      );
      expect(getLearningMaterial(db, bookId, "day1")?.content.headline).toBe(
        "Core concept reminders: The Quiet Garden"
      );
      expect(getLearningMaterial(db, bookId, "day30")?.content.headline).toBe(
        "Comprehensive review: The Quiet Garden"
      );
    });

    it("should record a timed processing log", async () => {
      const result = await createProcessor().processUpload(
        upload("garden.txt", BOOK_TEXT)
      );

      const steps = [
        "save_file",
        "extract_text",
        "analyze_structure",
        "detect_chapters",
        "store_chapters",
        "analyze_chapters",
        "synthesize_book",
      ];
      expect(result?.processingLog.map((e) => e.step)).toEqual(steps);
      expect(progress.map((e) => e.step)).toEqual(steps);
      expect(
        getBook(db, result?.bookId ?? -1)?.processingLog?.map((e) => e.step)
      ).toEqual(steps);
      expect(progress.find((e) => e.step === "detect_chapters")?.detail).toEqual({
        chapters: 2,
      });
      expect(progress.every((e) => e.durationMs >= 0)).toBe(true);
    });

    it("should stop after storing chapters without an analyzer", async () => {
      const result = await createProcessor(false).processUpload(
        upload("garden.txt", BOOK_TEXT)
      );
      const bookId = result?.bookId ?? -1;

      expect(getBook(db, bookId)?.processingStatus).toBe("completed");
      expect(getBookChapters(db, bookId)).toHaveLength(2);
      expect(getBookSynthesis(db, bookId)).toBeNull();
      expect(progress.map((e) => e.step)).not.toContain("analyze_chapters");
      expect(
        getBookChapters(db, bookId).every((c) => c.processingStatus === "pending")
      ).toBe(true);
    });

    it("should fall back to the file name when no title is found", async () => {
      const result = await createProcessor(false).processUpload(
        upload("plain-notes.txt", "just plain prose with no markers")
      );

      expect(result).toMatchObject({
        title: "plain-notes",
        author: "Unknown Author",
        chapterCount: 1,
      });
      expect(getBook(db, result?.bookId ?? -1)?.author).toBeNull();
    });

    it("should mark the book as failed when text cannot be extracted", async () => {
      const result = await createProcessor().processUpload(
        upload("notes.docx", "irrelevant")
      );

      expect(result).toBeNull();
      const [book] = getUserBooks(db, userId);
      expect(book.title).toBe("notes");
      expect(book.processingStatus).toBe("error");
      expect(book.processingLog?.map((e) => e.step)).toEqual([
        "save_file",
        "extract_text",
      ]);
      expect(onError).toHaveBeenCalledTimes(1);
      expect(onError.mock.calls[0][0]).toBe("notes.docx");
      expect(onError.mock.calls[0][1].message).toBe("Could not extract text");
      expect(analyzer.chapterCalls).toEqual([]);
    });

    it("should mark the book as failed when analysis throws", async () => {
      analyzer.failOnChapterTitle("Roots");

      const result = await createProcessor().processUpload(
        upload("garden.txt", BOOK_TEXT)
      );

      expect(result).toBeNull();
      const [book] = getUserBooks(db, userId);
      expect(book.processingStatus).toBe("error");
      expect(onError.mock.calls[0][1].message).toBe(
        "Mock analysis failed for chapter 'Roots'"
      );
      expect(analyzer.synthesisCalls).toBe(0);
    });

    it("should store no analyses when a chapter analysis fails", async () => {
      analyzer.failOnChapterTitle("Seeds");

      const result = await createProcessor(true, 1).processUpload(
        upload("garden.txt", BOOK_TEXT)
      );

      expect(result).toBeNull();
      const [book] = getUserBooks(db, userId);
      expect(book.processingStatus).toBe("error");
      expect(analyzer.chapterCalls).toEqual(["Seeds"]);
      expect(getChapterAnalyses(db, book.id)).toEqual([]);
      expect(
        getBookChapters(db, book.id).map((c) => c.processingStatus)
      ).toEqual(["pending", "pending"]);
    });

    it("should reject unsafe file names before creating a book", async () => {
      const result = await createProcessor().processUpload(upload("..", "text"));

      expect(result).toBeNull();
      expect(getUserBooks(db, userId)).toEqual([]);
      expect(onError.mock.calls[0][1].message).toBe("Invalid file name: ..");
    });
  });
});
