import { z } from "zod";

/**
 * Zod schema for a single chapter analysis returned by the LLM.
 */
export const ChapterAnalysisSchema = z.object({
  summary: z.string().describe("Concise summary of the chapter in 3-5 sentences"),
  keyConcepts: z
    .array(z.string())
    .describe("Key concepts and ideas introduced in the chapter"),
  mainArguments: z
    .array(z.string())
    .describe("Main arguments or claims the author makes"),
  terminology: z
    .array(z.string())
    .describe("Chapter-specific terms a reader should learn"),
  importantQuotes: z
    .array(z.string())
    .describe("Short notable quotes or passages, verbatim"),
});

export const ConceptNodeSchema = z.object({
  concept: z.string().describe("A book-wide concept"),
  subconcepts: z
    .array(z.string())
    .describe("Narrower ideas that belong under this concept"),
});

/**
 * Zod schema for the book-wide synthesis built from chapter analyses.
 */
export const BookSynthesisSchema = z.object({
  summaryShort: z.string().describe("One-paragraph overview of the book"),
  summaryDetailed: z
    .string()
    .describe("Detailed multi-paragraph summary covering every chapter"),
  keyThemes: z.array(z.string()).describe("Themes that span several chapters"),
  conceptHierarchy: z
    .array(ConceptNodeSchema)
    .describe("Book-wide concepts with their subconcepts"),
});

export const QuestionAnswerSchema = z.object({
  question: z.string().describe("Question testing the reader's retention"),
  answer: z.string().describe("Expected answer"),
});

/**
 * Zod schema for the material sent at one spaced-repetition interval.
 */
export const LearningMaterialSchema = z.object({
  headline: z.string().describe("Short title for this review session"),
  keyPoints: z.array(z.string()).describe("Points to review in this session"),
  questions: z
    .array(QuestionAnswerSchema)
    .describe("Questions with answers, matched to the interval's focus"),
});

/**
 * Infer TypeScript types from Zod schemas
 */
export type ChapterAnalysisJSONType = z.infer<typeof ChapterAnalysisSchema>;
export type BookSynthesisJSONType = z.infer<typeof BookSynthesisSchema>;
export type LearningMaterialJSONType = z.infer<typeof LearningMaterialSchema>;
