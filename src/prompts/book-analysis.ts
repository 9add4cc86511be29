import type {
  BookContext,
  BookSynthesis,
  ChapterAnalysis,
} from "../core/types";
import type { LearningInterval } from "../learning/intervals";

export const CHAPTER_ANALYSIS_PROMPT = `You are helping a reader retain what they read.

Analyze the chapter below and provide:
1. summary: A concise summary (3-5 sentences)
2. keyConcepts: Key concepts and ideas presented
3. mainArguments: The main arguments or claims
4. terminology: Chapter-specific terms worth learning
5. importantQuotes: Notable quotes or passages, verbatim

Focus on the most important elements that a reader should remember.
If the chapter has no substantial content (e.g. a title page), return empty arrays and a one-sentence summary.`;

export const BOOK_SYNTHESIS_PROMPT = `Based on the chapter analyses below, generate:
1. summaryShort: A one-paragraph overview of the book
2. summaryDetailed: A detailed summary covering the whole book
3. keyThemes: Themes explored across several chapters
4. conceptHierarchy: The book's main concepts, each with its subconcepts

Create a cohesive overview that captures the essence of the entire book.`;

export const LEARNING_MATERIAL_PROMPT = `You are writing one session of a spaced-repetition schedule for a book the reader has finished.

Write:
- headline: A short title for this session
- keyPoints: The points to review
- questions: Questions with answers that match the session focus

Keep every question answerable from the book synthesis below.`;

export function formatBookContext(book: BookContext): string {
  return `<book_context>
Title: ${book.title}
Author: ${book.author}
</book_context>`;
}

/**
 * Chapter prompt with its text split into numbered chunks.
 * `omittedChunks` is reported so the model knows the text is partial.
 */
export function buildChapterPrompt(
  book: BookContext,
  chapterTitle: string,
  chunks: string[],
  omittedChunks: number
): string {
  const body = chunks
    .map((text, i) => `[Part ${i + 1}]\n${text}`)
    .join("\n\n---\n\n");
  const note =
    omittedChunks > 0
      ? `\n\n[${omittedChunks} further part(s) omitted for length]`
      : "";

  return `${CHAPTER_ANALYSIS_PROMPT}

${formatBookContext(book)}

<chapter>
Title: ${chapterTitle}

${body}${note}
</chapter>`;
}

export function buildSynthesisPrompt(
  book: BookContext,
  chapters: Array<ChapterAnalysis & { title: string }>
): string {
  const summaries = chapters
    .map(
      (c, i) => `Chapter ${i + 1}: ${c.title}
Summary: ${c.summary}
Key concepts: ${c.keyConcepts.join(", ")}`
    )
    .join("\n\n");

  return `${BOOK_SYNTHESIS_PROMPT}

${formatBookContext(book)}

<chapter_summaries>
${summaries}
</chapter_summaries>`;
}

export function buildLearningMaterialPrompt(
  interval: LearningInterval,
  book: BookContext,
  synthesis: BookSynthesis
): string {
  const concepts = synthesis.conceptHierarchy
    .map((node) => `- ${node.concept}: ${node.subconcepts.join(", ")}`)
    .join("\n");

  return `${LEARNING_MATERIAL_PROMPT}

Session: Day ${interval.dayOffset} - ${interval.label}
Focus: ${interval.focus}

${formatBookContext(book)}

<synthesis>
Summary: ${synthesis.summaryDetailed}
Themes: ${synthesis.keyThemes.join(", ")}
Concepts:
${concepts}
</synthesis>`;
}
