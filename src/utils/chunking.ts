/**
 * Text chunking utility for splitting chapters into prompt-sized pieces.
 * Chunks text by character count with smart boundary detection.
 */

import type { DetectedChapter } from "../core/types"

export interface TextChunk {
  text: string
  charCount: number
  index: number
  startOffset: number
  endOffset: number
}

/**
 * Chunk text into segments of specified maximum character length.
 * Attempts to break on sentence boundaries when possible.
 *
 * @param text - Text to chunk
 * @param maxChars - Maximum characters per chunk (default: 1024)
 * @param overlap - Characters repeated at the start of the next chunk (default: 0)
 * @returns Array of text chunks
 */
export function chunkText(
  text: string,
  maxChars: number = 1024,
  overlap: number = 0
): TextChunk[] {
  if (overlap < 0 || overlap >= maxChars) {
    throw new Error(`Invalid overlap ${overlap} for chunk size ${maxChars}`)
  }

  // If text fits in one chunk, return it whole
  if (text.length <= maxChars) {
    const trimmed = text.trim()
    if (trimmed.length === 0) return []
    return [{
      text: trimmed,
      charCount: trimmed.length,
      index: 0,
      startOffset: 0,
      endOffset: text.length
    }]
  }

  const chunks: TextChunk[] = []
  let start = 0
  let chunkIndex = 0

  while (start < text.length) {
    let end = start + maxChars

    // If we're not at the end of the text, try to find a sentence boundary
    if (end < text.length) {
      // Look back over the last 200 chars for a sentence boundary
      const windowStart = Math.max(start, end - 200)
      const searchText = text.substring(windowStart, end)
      const boundary = lastSentenceBoundary(searchText)

      if (boundary !== -1) {
        end = windowStart + boundary
      } else {
        // No sentence boundary found, try to break on whitespace
        const lastSpace = text.lastIndexOf(' ', end)
        if (lastSpace > start) {
          end = lastSpace + 1 // Include the space
        }
      }
    } else {
      // We're at or past the end, just take the rest
      end = text.length
    }

    const chunkText = text.substring(start, end).trim()

    if (chunkText.length > 0) {
      chunks.push({
        text: chunkText,
        charCount: chunkText.length,
        index: chunkIndex++,
        startOffset: start,
        endOffset: end
      })
    }

    if (end >= text.length) break

    start = nextStart(text, start, end, overlap)
  }

  return chunks
}

/**
 * Estimate how many chunks chunkText will produce, without chunking.
 * Boundary snapping can shift the real count by a chunk or so.
 *
 * @param textLength - Length of the text in characters
 * @param maxChars - Maximum characters per chunk
 * @param overlap - Characters repeated at the start of the next chunk
 */
export function estimateChunkCount(
  textLength: number,
  maxChars: number = 1024,
  overlap: number = 0
): number {
  if (textLength <= 0) {
    return 0
  }
  if (textLength <= maxChars) {
    return 1
  }
  return 1 + Math.ceil((textLength - maxChars) / (maxChars - overlap))
}

/**
 * Index just past the last sentence terminator followed by whitespace, or -1.
 */
function lastSentenceBoundary(searchText: string): number {
  let boundary = -1
  const pattern = /[.!?]\s/g
  let match: RegExpExecArray | null

  while ((match = pattern.exec(searchText)) !== null) {
    boundary = match.index + 2 // Include punctuation and space
  }

  return boundary
}

/**
 * Step back by `overlap` characters, snapping forward to a word start.
 * Always moves past the previous chunk start.
 */
function nextStart(text: string, start: number, end: number, overlap: number): number {
  if (overlap === 0) return end

  let candidate = end - overlap
  const space = text.indexOf(' ', candidate)
  if (space !== -1 && space < end) {
    candidate = space + 1
  }

  return candidate > start ? candidate : end
}

// =============================================================================
// Chapter Chunking
// =============================================================================

export interface ChapterChunk extends TextChunk {
  chapterNumber: number
  chapterTitle: string
  level: number
}

/**
 * Chunk a chapter, tagging every chunk with the chapter it came from.
 * Chunk offsets are relative to the book text, not the chapter.
 */
export function chunkChapter(
  chapter: DetectedChapter,
  options: { chunkSize: number; chunkOverlap: number }
): ChapterChunk[] {
  return chunkText(chapter.content, options.chunkSize, options.chunkOverlap).map(
    (chunk) => ({
      ...chunk,
      startOffset: chapter.startOffset + chunk.startOffset,
      endOffset: chapter.startOffset + chunk.endOffset,
      chapterNumber: chapter.number,
      chapterTitle: chapter.title,
      level: chapter.level
    })
  )
}
