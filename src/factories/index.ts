import { Config, BookAnalyzer, TextExtractor } from "../core/types";
import { DrizzleDB } from "../db/client";
import { createDatabase } from "../db/database";
import { BookTextExtractor, TextExtractorOptions } from "../parsers/text-extractor";
import { LlmBookAnalyzer } from "../services/book-analyzer";
import { BookProcessor, BookProcessorOptions } from "../services/book-processor";
import { CommandRouter } from "../bot/command-router";
import { MockBookAnalyzer } from "../mocks";
import { getModel } from "../llm/client";

export { createDatabase };

/**
 * Factory for creating the text extractor.
 */
export function createTextExtractor(
  options?: TextExtractorOptions
): TextExtractor {
  return new BookTextExtractor(options);
}

/**
 * Factory for creating the book analyzer based on config.
 */
export function createBookAnalyzer(config: Config): BookAnalyzer {
  switch (config.llm.provider) {
    case "mock":
      return new MockBookAnalyzer();

    case "openrouter":
      return new LlmBookAnalyzer(
        getModel(config.llm.model, config.llm.apiKey),
        config.llm.model,
        {
          chunkSize: config.processing.chunkSize,
          chunkOverlap: config.processing.chunkOverlap,
          maxPromptChars: config.processing.maxPromptChars,
          temperature: config.llm.temperature,
          maxTokens: config.llm.maxTokens,
        }
      );

    default:
      throw new Error(`Unknown llm provider: ${String(config.llm.provider)}`);
  }
}

/**
 * Factory for creating a fully-wired book processor.
 * Pass `analyzer: null` to stop after storing chapters.
 */
export function createBookProcessor(
  config: Config,
  db?: DrizzleDB,
  options?: {
    analyzer?: BookAnalyzer | null;
    extractor?: TextExtractor;
  } & Pick<BookProcessorOptions, "onProgress" | "onError">
): BookProcessor {
  const database = db || createDatabase(config.db.path);
  const extractor = options?.extractor ?? createTextExtractor();
  const analyzer =
    options?.analyzer === undefined
      ? createBookAnalyzer(config)
      : options.analyzer;

  return new BookProcessor(database, extractor, analyzer, {
    booksDir: config.storage.booksDir,
    concurrency: config.processing.concurrency,
    onProgress: options?.onProgress,
    onError: options?.onError,
  });
}

/**
 * Factory for creating the chat command router.
 */
export function createCommandRouter(
  config: Config,
  db?: DrizzleDB
): CommandRouter {
  const database = db || createDatabase(config.db.path);
  return new CommandRouter(database, createBookProcessor(config, database));
}
