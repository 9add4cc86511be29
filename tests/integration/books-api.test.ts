import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { createDatabase } from "../../src/factories";
import { closeDatabase, type DrizzleDB } from "../../src/db/client";
import {
  chapters,
  chapterAnalyses,
  bookSyntheses,
  learningMaterials,
} from "../../src/db/schema";
import { createUser } from "../../src/api/users";
import {
  createBook,
  getBook,
  getBookChapters,
  getBookStructure,
  getBookSynthesis,
  getChapterAnalyses,
  getLearningMaterial,
  getUserBooks,
} from "../../src/api/books";

describe("books API", () => {
  let db: DrizzleDB;
  let userId: number;

  beforeEach(() => {
    db = createDatabase(":memory:");
    userId = createUser(db, { chatUserId: "2001" }).id;
  });

  afterEach(() => {
    closeDatabase(db);
  });

  function addChapter(bookId: number, chapterNumber: number, title: string) {
    return db
      .insert(chapters)
      .values({
        bookId,
        chapterNumber,
        title,
        content: `${title} text`,
        wordCount: 2,
        positionPercentage: 0,
        estimatedReadingTime: 1,
        startOffset: 0,
        endOffset: 10,
        sections: [],
      })
      .returning()
      .get();
  }

  it("should create manual books as pending", () => {
    const book = createBook(db, userId, "Walden", "Henry Thoreau");

    expect(book).toMatchObject({
      userId,
      title: "Walden",
      author: "Henry Thoreau",
      processingStatus: "pending",
      totalChapters: 0,
      filePath: null,
    });
  });

  it("should list a user's books in creation order", () => {
    createBook(db, userId, "First");
    createBook(db, userId, "Second");
    const other = createUser(db, { chatUserId: "2002" });
    createBook(db, other.id, "Not mine");

    expect(getUserBooks(db, userId).map((b) => b.title)).toEqual([
      "First",
      "Second",
    ]);
  });

  it("should scope getBook to the owner when asked", () => {
    const book = createBook(db, userId, "Owned");
    const other = createUser(db, { chatUserId: "2003" });

    expect(getBook(db, book.id)?.title).toBe("Owned");
    expect(getBook(db, book.id, userId)?.title).toBe("Owned");
    expect(getBook(db, book.id, other.id)).toBeNull();
    expect(getBook(db, 9999)).toBeNull();
  });

  it("should return chapters in reading order", () => {
    const book = createBook(db, userId, "Ordered");
    addChapter(book.id, 2, "Second");
    addChapter(book.id, 1, "First");

    expect(getBookChapters(db, book.id).map((c) => c.title)).toEqual([
      "First",
      "Second",
    ]);
  });

  it("should return null structure for manual books", () => {
    const book = createBook(db, userId, "Manual");
    expect(getBookStructure(db, book.id)).toBeNull();
  });

  it("should return the latest synthesis", () => {
    const book = createBook(db, userId, "Synth");
    const base = {
      bookId: book.id,
      summaryDetailed: "detail",
      keyThemes: ["t"],
      conceptHierarchy: [],
      model: "mock-analyzer",
      createdAt: new Date(),
    };
    db.insert(bookSyntheses).values({ ...base, summaryShort: "old" }).run();
    db.insert(bookSyntheses).values({ ...base, summaryShort: "new" }).run();

    expect(getBookSynthesis(db, book.id)).toEqual({
      summaryShort: "new",
      summaryDetailed: "detail",
      keyThemes: ["t"],
      conceptHierarchy: [],
    });
    expect(getBookSynthesis(db, 9999)).toBeNull();
  });

  it("should join analyses with their chapters", () => {
    const book = createBook(db, userId, "Analysed");
    const second = addChapter(book.id, 2, "Two");
    const first = addChapter(book.id, 1, "One");

    for (const chapter of [second, first]) {
      db.insert(chapterAnalyses)
        .values({
          chapterId: chapter.id,
          summary: `About ${chapter.title}`,
          keyConcepts: [chapter.title],
          mainArguments: [],
          terminology: [],
          importantQuotes: [],
          model: "mock-analyzer",
          createdAt: new Date(),
        })
        .run();
    }

    const analyses = getChapterAnalyses(db, book.id);

    expect(analyses.map((a) => [a.chapterNumber, a.title, a.summary])).toEqual([
      [1, "One", "About One"],
      [2, "Two", "About Two"],
    ]);
  });

  it("should fetch learning material by interval", () => {
    const book = createBook(db, userId, "Material");
    const content = { headline: "Recap", keyPoints: ["a"], questions: [] };
    db.insert(learningMaterials)
      .values({ bookId: book.id, intervalType: "day1", content, createdAt: new Date() })
      .run();

    expect(getLearningMaterial(db, book.id, "day1")?.content).toEqual(content);
    expect(getLearningMaterial(db, book.id, "day3")).toBeNull();
  });

  it("should reject a second material for the same interval", () => {
    const book = createBook(db, userId, "Unique");
    const row = {
      bookId: book.id,
      intervalType: "day7" as const,
      content: { headline: "h", keyPoints: [], questions: [] },
      createdAt: new Date(),
    };
    db.insert(learningMaterials).values(row).run();

    expect(() => db.insert(learningMaterials).values(row).run()).toThrow();
  });
});
