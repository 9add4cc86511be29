/**
 * Structure detection for raw book text.
 *
 * Pipeline: text → (front matter, main content) → (title, author)
 * → headings → metrics. Every stage is a pure function and falls back to
 * defaults instead of throwing, so any string yields a complete structure.
 */

import type {
  BookStructure,
  HeadingRecord,
  StructureMetadata,
} from "../core/types";
import { CHAPTER_START_TOKENS, matchHeading } from "./patterns";

export const UNKNOWN_TITLE = "Unknown Title";
export const UNKNOWN_AUTHOR = "Unknown Author";

const WORDS_PER_MINUTE = 225;
const MAX_COMPLEXITY_HEADINGS = 30;
// Tried in order on each line, case-insensitively
const AUTHOR_MARKERS = [/by /i, /author:/i];

/**
 * Split text into front matter and main content at the first chapter-start
 * token. The token stays at the start of the main content.
 * @returns [frontMatter, mainContent] - concatenated they equal `text`
 */
export function splitFrontMatter(text: string): [string, string] {
  for (const token of CHAPTER_START_TOKENS) {
    const index = text.indexOf(token);
    if (index !== -1) {
      return [text.slice(0, index), text.slice(index)];
    }
  }

  return ["", text];
}

/**
 * Read the title (first non-blank line) and author (first line carrying an
 * authorship marker) from front matter.
 */
export function extractTitleAuthor(frontMatter: string): {
  title: string;
  author: string;
} {
  const lines = frontMatter.split("\n").map((line) => line.trim());

  const title = lines.find((line) => line.length > 0) ?? UNKNOWN_TITLE;

  let author = UNKNOWN_AUTHOR;
  for (const line of lines) {
    const name = authorFromLine(line);
    if (name) {
      author = name;
      break;
    }
  }

  return { title, author };
}

function authorFromLine(line: string): string | null {
  for (const marker of AUTHOR_MARKERS) {
    const match = marker.exec(line);
    if (!match) continue;

    const name = line.slice(match.index + match[0].length).trim();
    if (name) return name;
  }

  return null;
}

/**
 * Find heading lines in the main content.
 * Each heading spans up to the next heading line (or the end of the text).
 *
 * @param mainContent - Text to scan
 * @param offsetBase - Added to every offset, so callers passing the front
 *   matter length get offsets into the raw text
 */
export function scanHeadings(
  mainContent: string,
  offsetBase: number = 0
): HeadingRecord[] {
  const found: Array<Omit<HeadingRecord, "endOffset">> = [];
  let position = 0;

  for (const line of mainContent.split("\n")) {
    const match = matchHeading(line.trim());
    if (match) {
      found.push({
        type: match.type,
        title: match.title,
        number: match.number,
        startOffset: offsetBase + position,
        level: 1,
      });
    }
    position += line.length + 1;
  }

  const textEnd = offsetBase + mainContent.length;

  return found.map((heading, i) => ({
    ...heading,
    endOffset: i + 1 < found.length ? found[i + 1].startOffset : textEnd,
  }));
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter((token) => token.length > 0).length;
}

export function estimateReadingTime(wordCount: number): number {
  return Math.max(1, Math.round(wordCount / WORDS_PER_MINUTE));
}

export function calculateComplexity(headingCount: number): number {
  if (headingCount === 0) return 0;
  return Math.min(1, headingCount / MAX_COMPLEXITY_HEADINGS);
}

export function calculateMetrics(
  text: string,
  headings: HeadingRecord[]
): Omit<StructureMetadata, "hasFrontMatter"> {
  const wordCount = countWords(text);

  return {
    wordCount,
    readingTimeMinutes: estimateReadingTime(wordCount),
    complexity: calculateComplexity(headings.length),
  };
}

/**
 * Detect the structure of a book.
 * Heading offsets are relative to `text`, front matter included.
 */
export function analyzeStructure(text: string): BookStructure {
  const [frontMatter, mainContent] = splitFrontMatter(text);
  const { title, author } = extractTitleAuthor(frontMatter);
  const headings = scanHeadings(mainContent, frontMatter.length);
  const metrics = calculateMetrics(text, headings);

  return Object.freeze({
    title,
    author,
    headings: Object.freeze(headings.map((h) => Object.freeze(h))),
    metadata: Object.freeze({
      wordCount: metrics.wordCount,
      readingTimeMinutes: metrics.readingTimeMinutes,
      hasFrontMatter: frontMatter.trim().length > 0,
      complexity: metrics.complexity,
    }),
  });
}
