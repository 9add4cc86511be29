import type {
  BookStructure,
  DetectedChapter,
  HeadingRecord,
  OutlineNode,
  TableOfContentsEntry,
} from "../core/types";
import { analyzeStructure } from "./structure-detector";

/**
 * Nest section headings under the chapter that precedes them.
 * The flat scanner emits every heading at level 1; here sections become
 * level-2 children and the chapter's span grows to cover them.
 */
export function buildOutline(headings: readonly HeadingRecord[]): OutlineNode[] {
  const outline: OutlineNode[] = [];
  let current: OutlineNode | null = null;

  for (const heading of headings) {
    if (heading.type === "section" && current?.type === "chapter") {
      current.children.push({ ...heading, level: 2, children: [] });
      current.endOffset = Math.max(current.endOffset, heading.endOffset);
      continue;
    }

    current = { ...heading, level: 1, children: [] };
    outline.push(current);
  }

  return outline;
}

/**
 * Flatten an outline into table-of-contents entries ordered by position.
 */
export function getTableOfContents(
  outline: OutlineNode[]
): TableOfContentsEntry[] {
  const entries: TableOfContentsEntry[] = [];

  const visit = (node: OutlineNode) => {
    entries.push({
      title: node.title,
      level: node.level,
      position: node.startOffset,
    });
    node.children.forEach(visit);
  };
  outline.forEach(visit);

  return entries.sort((a, b) => a.position - b.position);
}

/**
 * Cut the book text into chapters using its detected structure.
 * Text without any heading becomes a single chapter; blank text has none.
 *
 * @param text - Raw book text (the same text the structure was built from)
 * @param structure - Precomputed structure, detected from `text` if omitted
 */
export function detectChapters(
  text: string,
  structure: BookStructure = analyzeStructure(text)
): DetectedChapter[] {
  if (text.trim().length === 0) {
    return [];
  }

  const outline = buildOutline(structure.headings);

  if (outline.length === 0) {
    return [
      {
        number: 1,
        title: "Chapter 1",
        content: text,
        startOffset: 0,
        endOffset: text.length,
        level: 1,
        sections: [],
      },
    ];
  }

  return outline.map((node, i) => ({
    number: i + 1,
    title: node.title,
    content: text.slice(node.startOffset, node.endOffset),
    startOffset: node.startOffset,
    endOffset: node.endOffset,
    level: node.level,
    sections: node.children.map((child) => ({
      title: child.title,
      level: child.level,
      position: child.startOffset,
    })),
  }));
}
