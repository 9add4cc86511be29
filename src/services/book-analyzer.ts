import { generateObject, type LanguageModel } from "ai";
import type {
  BookAnalyzer,
  BookContext,
  BookSynthesis,
  ChapterAnalysis,
  ChapterInput,
  IntervalType,
  LearningMaterialContent,
} from "../core/types";
import {
  BookSynthesisSchema,
  ChapterAnalysisSchema,
  LearningMaterialSchema,
} from "../schemas/analysis";
import {
  buildChapterPrompt,
  buildLearningMaterialPrompt,
  buildSynthesisPrompt,
} from "../prompts/book-analysis";
import { getInterval } from "../learning/intervals";
import { chunkText } from "../utils/chunking";

export interface LlmBookAnalyzerOptions {
  chunkSize: number;
  chunkOverlap: number;
  maxPromptChars: number;
  temperature?: number;
  maxTokens?: number;
}

/**
 * Book analyzer backed by an LLM with structured (zod-validated) output.
 */
export class LlmBookAnalyzer implements BookAnalyzer {
  constructor(
    private languageModel: LanguageModel,
    readonly model: string,
    private options: LlmBookAnalyzerOptions
  ) {}

  async analyzeChapter(
    chapter: ChapterInput,
    book: BookContext
  ): Promise<ChapterAnalysis> {
    const { included, omitted } = this.selectChunks(chapter.content);

    const { object } = await generateObject({
      model: this.languageModel,
      schema: ChapterAnalysisSchema,
      prompt: buildChapterPrompt(book, chapter.title, included, omitted),
      temperature: this.options.temperature,
      maxTokens: this.options.maxTokens,
    });

    return object;
  }

  async synthesizeBook(
    book: BookContext,
    chapters: Array<ChapterAnalysis & { title: string }>
  ): Promise<BookSynthesis> {
    const { object } = await generateObject({
      model: this.languageModel,
      schema: BookSynthesisSchema,
      prompt: buildSynthesisPrompt(book, chapters),
      temperature: this.options.temperature,
      maxTokens: this.options.maxTokens,
    });

    return object;
  }

  async generateLearningMaterial(
    interval: IntervalType,
    book: BookContext,
    synthesis: BookSynthesis
  ): Promise<LearningMaterialContent> {
    const { object } = await generateObject({
      model: this.languageModel,
      schema: LearningMaterialSchema,
      prompt: buildLearningMaterialPrompt(getInterval(interval), book, synthesis),
      temperature: this.options.temperature,
      maxTokens: this.options.maxTokens,
    });

    return object;
  }

  /**
   * Take chapter chunks in order until the prompt budget is spent.
   * The first chunk is always included.
   */
  private selectChunks(content: string): { included: string[]; omitted: number } {
    const chunks = chunkText(
      content,
      this.options.chunkSize,
      this.options.chunkOverlap
    );

    const included: string[] = [];
    let used = 0;

    for (const chunk of chunks) {
      if (included.length > 0 && used + chunk.charCount > this.options.maxPromptChars) {
        break;
      }
      included.push(chunk.text);
      used += chunk.charCount;
    }

    return { included, omitted: chunks.length - included.length };
  }
}
