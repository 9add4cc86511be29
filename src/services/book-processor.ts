import { basename, extname } from "path";
import { eq } from "drizzle-orm";
import pLimit from "p-limit";
import type {
  BookAnalyzer,
  BookContext,
  BookStructure,
  BookUpload,
  ChapterAnalysis,
  DetectedChapter,
  ProcessedBook,
  ProcessingLogEntry,
  TextExtractor,
  UploadProcessor,
} from "../core/types";
import { DrizzleDB } from "../db/client";
import {
  books,
  chapters as chaptersTable,
  chapterAnalyses,
  bookSyntheses,
  learningMaterials,
  type Chapter,
} from "../db/schema";
import {
  analyzeStructure,
  countWords,
  estimateReadingTime,
  UNKNOWN_AUTHOR,
  UNKNOWN_TITLE,
} from "../books/structure-detector";
import { detectChapters } from "../books/chapter-detector";
import { saveUploadedFile } from "../storage/book-files";
import { LEARNING_INTERVALS } from "../learning/intervals";

export interface BookProcessorOptions {
  booksDir: string;
  concurrency?: number;
  /** Called after every completed step */
  onProgress?: (entry: ProcessingLogEntry) => void;
  /** Called when processing fails; defaults to console.error */
  onError?: (fileName: string, error: Error) => void;
}

/**
 * Runs an uploaded book through the whole pipeline:
 * save → extract → structure → chapters → (analysis → synthesis → materials).
 * Failures never throw; the book is marked "error" and null is returned.
 */
export class BookProcessor implements UploadProcessor {
  private concurrency: number;
  private onError: (fileName: string, error: Error) => void;

  constructor(
    private db: DrizzleDB,
    private extractor: TextExtractor,
    private analyzer: BookAnalyzer | null,
    private options: BookProcessorOptions
  ) {
    this.concurrency = options.concurrency ?? 3;
    this.onError =
      options.onError ??
      ((fileName, error) =>
        console.error(`Error processing book ${fileName}: ${error.message}`));
  }

  async processUpload(upload: BookUpload): Promise<ProcessedBook | null> {
    const log: ProcessingLogEntry[] = [];
    let bookId: number | null = null;

    try {
      const filePath = await this.timed(log, "save_file", () =>
        saveUploadedFile(
          this.options.booksDir,
          upload.userKey,
          upload.fileName,
          upload.content
        )
      );

      const fileType = extname(upload.fileName).toLowerCase();
      const fallbackTitle = basename(upload.fileName, extname(upload.fileName));

      const book = this.db
        .insert(books)
        .values({
          userId: upload.userId,
          title: fallbackTitle,
          filePath,
          fileType,
          processingStatus: "processing",
          createdAt: new Date(),
        })
        .returning()
        .get();
      bookId = book.id;
      const currentBookId = book.id;

      const text = await this.timed(
        log,
        "extract_text",
        () => this.extractor.extract(filePath),
        (result) => ({ textLength: result?.length ?? 0 })
      );

      if (text === null) {
        this.markFailed(currentBookId, log);
        this.onError(upload.fileName, new Error("Could not extract text"));
        return null;
      }

      const structure = await this.timed(
        log,
        "analyze_structure",
        () => analyzeStructure(text),
        (result) => ({ headings: result.headings.length })
      );

      const detected = await this.timed(
        log,
        "detect_chapters",
        () => detectChapters(text, structure),
        (result) => ({ chapters: result.length })
      );

      const context: BookContext = {
        title: structure.title !== UNKNOWN_TITLE ? structure.title : fallbackTitle,
        author: structure.author,
      };

      const stored = await this.timed(log, "store_chapters", () =>
        this.storeChapters(currentBookId, context, structure, detected)
      );

      if (this.analyzer) {
        const analyzer = this.analyzer;
        await this.timed(log, "analyze_chapters", () =>
          this.analyzeChapters(analyzer, stored, context)
        );
        await this.timed(log, "synthesize_book", () =>
          this.synthesize(analyzer, currentBookId, stored, context)
        );
      }

      this.db
        .update(books)
        .set({ processingStatus: "completed", processingLog: log })
        .where(eq(books.id, currentBookId))
        .run();

      return {
        bookId: currentBookId,
        title: context.title,
        author: context.author,
        chapterCount: stored.length,
        structure,
        processingLog: log,
      };
    } catch (error) {
      if (bookId !== null) {
        this.markFailed(bookId, log);
      }
      this.onError(
        upload.fileName,
        error instanceof Error ? error : new Error(String(error))
      );
      return null;
    }
  }

  private storeChapters(
    bookId: number,
    context: BookContext,
    structure: BookStructure,
    detected: DetectedChapter[]
  ): Chapter[] {
    return this.db.transaction((tx) => {
      const rows = detected.map((chapter, i) => {
        const wordCount = countWords(chapter.content);
        return tx
          .insert(chaptersTable)
          .values({
            bookId,
            chapterNumber: chapter.number,
            title: chapter.title,
            content: chapter.content,
            wordCount,
            positionPercentage: (i / detected.length) * 100,
            estimatedReadingTime: estimateReadingTime(wordCount),
            startOffset: chapter.startOffset,
            endOffset: chapter.endOffset,
            sections: chapter.sections,
          })
          .returning()
          .get();
      });

      tx.update(books)
        .set({
          title: context.title,
          author: context.author !== UNKNOWN_AUTHOR ? context.author : null,
          totalChapters: rows.length,
          processedChapters: rows.length,
          wordCount: structure.metadata.wordCount,
          readingTimeMinutes: structure.metadata.readingTimeMinutes,
          complexityScore: structure.metadata.complexity,
          structure,
        })
        .where(eq(books.id, bookId))
        .run();

      return rows;
    });
  }

  /**
   * Analyze every chapter, then store all analyses in one transaction.
   * The first failure drops the queued chapters and nothing is stored.
   */
  private async analyzeChapters(
    analyzer: BookAnalyzer,
    chapters: Chapter[],
    context: BookContext
  ): Promise<void> {
    const limit = pLimit(this.concurrency);

    const analyses = await Promise.all(
      chapters.map((chapter) =>
        limit(async () => {
          try {
            return await analyzer.analyzeChapter(
              {
                number: chapter.chapterNumber,
                title: chapter.title,
                content: chapter.content,
              },
              context
            );
          } catch (error) {
            limit.clearQueue();
            throw error;
          }
        })
      )
    );

    const createdAt = new Date();
    this.db.transaction((tx) => {
      chapters.forEach((chapter, i) => {
        tx.insert(chapterAnalyses)
          .values({
            chapterId: chapter.id,
            ...analyses[i],
            model: analyzer.model,
            createdAt,
          })
          .run();

        tx.update(chaptersTable)
          .set({ processingStatus: "completed" })
          .where(eq(chaptersTable.id, chapter.id))
          .run();
      });
    });
  }

  private async synthesize(
    analyzer: BookAnalyzer,
    bookId: number,
    chapters: Chapter[],
    context: BookContext
  ): Promise<void> {
    const analyses: Array<ChapterAnalysis & { title: string }> = chapters.map(
      (chapter) => {
        const row = this.db
          .select()
          .from(chapterAnalyses)
          .where(eq(chapterAnalyses.chapterId, chapter.id))
          .get();
        if (!row) {
          throw new Error(`Missing analysis for chapter ${chapter.chapterNumber}`);
        }
        return {
          title: chapter.title,
          summary: row.summary,
          keyConcepts: row.keyConcepts,
          mainArguments: row.mainArguments,
          terminology: row.terminology,
          importantQuotes: row.importantQuotes,
        };
      }
    );

    const synthesis = await analyzer.synthesizeBook(context, analyses);

    this.db
      .insert(bookSyntheses)
      .values({
        bookId,
        ...synthesis,
        model: analyzer.model,
        createdAt: new Date(),
      })
      .run();

    for (const interval of LEARNING_INTERVALS) {
      const content = await analyzer.generateLearningMaterial(
        interval.type,
        context,
        synthesis
      );

      this.db
        .insert(learningMaterials)
        .values({
          bookId,
          intervalType: interval.type,
          content,
          createdAt: new Date(),
        })
        .run();
    }
  }

  private markFailed(bookId: number, log: ProcessingLogEntry[]): void {
    this.db
      .update(books)
      .set({ processingStatus: "error", processingLog: log })
      .where(eq(books.id, bookId))
      .run();
  }

  /**
   * Run one pipeline step, appending its duration to the log.
   */
  private async timed<T>(
    log: ProcessingLogEntry[],
    step: string,
    fn: () => T | Promise<T>,
    detail?: (result: T) => Record<string, string | number>
  ): Promise<T> {
    const started = performance.now();
    const result = await fn();

    const entry: ProcessingLogEntry = {
      step,
      durationMs: Math.round(performance.now() - started),
      ...(detail && { detail: detail(result) }),
    };
    log.push(entry);
    this.options.onProgress?.(entry);

    return result;
  }
}
