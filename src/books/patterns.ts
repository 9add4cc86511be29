import type { HeadingType } from "../core/types";

/**
 * A heading convention: the first capture group is the number,
 * the optional second group is the title suffix.
 */
export interface HeadingPattern {
  name: string;
  type: HeadingType;
  regex: RegExp;
}

// Order matters: a line is tagged by the first pattern that matches it.
export const HEADING_PATTERNS: readonly HeadingPattern[] = [
  {
    name: "chapter",
    type: "chapter",
    regex: /^(?:Chapter|CHAPTER)\s+(\d+|[IVXLCDM]+)\b(?:\s*[:.-]\s*)?(.+)?/,
  },
  {
    name: "section",
    type: "section",
    regex: /^(?:Section|SECTION)\s+(\d+|[IVXLCDM]+)\b(?:\s*[:.-]\s*)?(.+)?/,
  },
  {
    name: "numbered",
    type: "chapter",
    regex: /^\s*(\d+|[IVXLCDM]+)\.\s+(.+)$/,
  },
];

// Literal markers that open the main content, tried in this order.
// The first marker present anywhere in the text wins, even if a later
// marker occurs earlier in the text.
export const CHAPTER_START_TOKENS: readonly string[] = [
  "Chapter 1",
  "CHAPTER 1",
  "Chapter One",
  "CHAPTER ONE",
  "1.",
  "I.",
  "Part 1",
  "PART 1",
];

export interface HeadingMatch {
  type: HeadingType;
  number: string;
  title: string;
}

/**
 * Match a single (already trimmed) line against the pattern table.
 */
export function matchHeading(line: string): HeadingMatch | null {
  for (const pattern of HEADING_PATTERNS) {
    const match = pattern.regex.exec(line);
    if (!match) continue;

    const number = match[1];
    const suffix = match[2]?.trim();

    return {
      type: pattern.type,
      number,
      title: suffix ? suffix : `Chapter ${number}`,
    };
  }

  return null;
}
