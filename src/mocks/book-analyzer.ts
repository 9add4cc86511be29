import type {
  BookAnalyzer,
  BookContext,
  BookSynthesis,
  ChapterAnalysis,
  ChapterInput,
  IntervalType,
  LearningMaterialContent,
} from "../core/types";
import { getInterval } from "../learning/intervals";

/**
 * Offline analyzer returning canned payloads.
 * Used when llm.provider is "mock" and throughout the tests.
 */
export class MockBookAnalyzer implements BookAnalyzer {
  readonly model = "mock-analyzer";
  public chapterCalls: string[] = [];
  public synthesisCalls = 0;
  public materialCalls: IntervalType[] = [];

  private failOnChapter?: string;

  /**
   * Make analyzeChapter reject for the chapter with this title.
   */
  failOnChapterTitle(title: string) {
    this.failOnChapter = title;
  }

  async analyzeChapter(
    chapter: ChapterInput,
    _book: BookContext
  ): Promise<ChapterAnalysis> {
    this.chapterCalls.push(chapter.title);

    if (this.failOnChapter === chapter.title) {
      throw new Error(`Mock analysis failed for chapter '${chapter.title}'`);
    }

    return {
      summary: `This is a mock summary of chapter '${chapter.title}'.`,
      keyConcepts: [`${chapter.title} concept 1`, `${chapter.title} concept 2`],
      mainArguments: [`Main argument of '${chapter.title}'`],
      terminology: ["term1", "term2"],
      importantQuotes: ["quote1"],
    };
  }

  async synthesizeBook(
    book: BookContext,
    chapters: Array<ChapterAnalysis & { title: string }>
  ): Promise<BookSynthesis> {
    this.synthesisCalls++;

    return {
      summaryShort: `This is a mock summary of '${book.title}'.`,
      summaryDetailed: `'${book.title}' by ${book.author} covers ${chapters.length} chapter(s).`,
      keyThemes: ["theme1", "theme2", "theme3"],
      conceptHierarchy: chapters.map((c) => ({
        concept: c.title,
        subconcepts: c.keyConcepts,
      })),
    };
  }

  async generateLearningMaterial(
    interval: IntervalType,
    book: BookContext,
    synthesis: BookSynthesis
  ): Promise<LearningMaterialContent> {
    this.materialCalls.push(interval);
    const { label } = getInterval(interval);

    return {
      headline: `${label}: ${book.title}`,
      keyPoints: synthesis.keyThemes.slice(0, 3),
      questions: [
        {
          question: `What is the central idea of '${book.title}'?`,
          answer: synthesis.summaryShort,
        },
      ],
    };
  }
}
