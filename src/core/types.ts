/**
 * Core type definitions for the Book Retention Bot
 */

// ============================================================================
// Book Structure
// ============================================================================

export type HeadingType = "chapter" | "section" | "subsection";

/**
 * A single detected structural boundary.
 * Offsets index into the raw book text (front matter included).
 */
export interface HeadingRecord {
  type: HeadingType;
  title: string;
  number: string;
  startOffset: number;
  endOffset: number;
  level: number;
}

export interface StructureMetadata {
  wordCount: number;
  readingTimeMinutes: number;
  hasFrontMatter: boolean;
  complexity: number; // 0-1, proportional to heading count
}

/**
 * Complete detected outline of a book. Frozen once built.
 */
export interface BookStructure {
  readonly title: string;
  readonly author: string;
  readonly headings: readonly HeadingRecord[];
  readonly metadata: Readonly<StructureMetadata>;
}

/**
 * A heading with the headings nested beneath it.
 */
export interface OutlineNode extends HeadingRecord {
  children: OutlineNode[];
}

export interface TableOfContentsEntry {
  title: string;
  level: number;
  position: number;
}

/**
 * A chapter cut out of the book text, ready to be stored.
 */
export interface DetectedChapter {
  number: number;
  title: string;
  content: string;
  startOffset: number;
  endOffset: number;
  level: number;
  sections: TableOfContentsEntry[];
}

// ============================================================================
// Text Extraction
// ============================================================================

/**
 * Extracts plain text from a book file.
 * Implementations: BookTextExtractor
 */
export interface TextExtractor {
  /**
   * Extract the full text of a book.
   * @returns The text, or null when the file is unreadable or unsupported
   */
  extract(filePath: string): Promise<string | null>;
}

// ============================================================================
// Book Analysis (LLM)
// ============================================================================

export interface BookContext {
  title: string;
  author: string;
}

export interface ChapterInput {
  number: number;
  title: string;
  content: string;
}

export interface ChapterAnalysis {
  summary: string;
  keyConcepts: string[];
  mainArguments: string[];
  terminology: string[];
  importantQuotes: string[];
}

export interface ConceptNode {
  concept: string;
  subconcepts: string[];
}

export interface BookSynthesis {
  summaryShort: string;
  summaryDetailed: string;
  keyThemes: string[];
  conceptHierarchy: ConceptNode[];
}

export type IntervalType = "day1" | "day3" | "day7" | "day30";

export interface QuestionAnswer {
  question: string;
  answer: string;
}

export interface LearningMaterialContent {
  headline: string;
  keyPoints: string[];
  questions: QuestionAnswer[];
}

/**
 * Generates analyses and learning material for a book.
 * Implementations: LlmBookAnalyzer, MockBookAnalyzer
 */
export interface BookAnalyzer {
  readonly model: string;

  analyzeChapter(
    chapter: ChapterInput,
    book: BookContext
  ): Promise<ChapterAnalysis>;

  synthesizeBook(
    book: BookContext,
    chapters: Array<ChapterAnalysis & { title: string }>
  ): Promise<BookSynthesis>;

  generateLearningMaterial(
    interval: IntervalType,
    book: BookContext,
    synthesis: BookSynthesis
  ): Promise<LearningMaterialContent>;
}

// ============================================================================
// Book Processing
// ============================================================================

export type ProcessingStatus = "pending" | "processing" | "completed" | "error";

export interface ProcessingLogEntry {
  step: string;
  durationMs: number;
  detail?: Record<string, string | number>;
}

export interface BookUpload {
  userId: number;
  userKey: string; // chat-side user id, used for the upload directory
  fileName: string;
  content: Buffer;
}

export interface ProcessedBook {
  bookId: number;
  title: string;
  author: string;
  chapterCount: number;
  structure: BookStructure;
  processingLog: ProcessingLogEntry[];
}

/**
 * Runs an uploaded file through the processing pipeline.
 * Implementations: BookProcessor
 */
export interface UploadProcessor {
  /**
   * @returns The processed book, or null when any step failed
   */
  processUpload(upload: BookUpload): Promise<ProcessedBook | null>;
}

// ============================================================================
// Configuration
// ============================================================================

export interface Config {
  llm: LLMConfig;
  db: DatabaseConfig;
  storage: StorageConfig;
  processing: ProcessingConfig;
  server?: ServerConfig;
}

export interface LLMConfig {
  provider: "openrouter" | "mock";
  model: string;
  apiKey?: string;
  temperature?: number;
  maxTokens?: number;
}

export interface DatabaseConfig {
  path: string;
}

export interface StorageConfig {
  booksDir: string;
}

export interface ProcessingConfig {
  chunkSize: number;
  chunkOverlap: number;
  concurrency: number;
  maxPromptChars: number;
}

export interface ServerConfig {
  port: number;
  host?: string;
  cors?: {
    origin: string;
  };
}
