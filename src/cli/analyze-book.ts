#!/usr/bin/env node

import { Command } from "commander";
import { basename } from "path";
import { createTextExtractor } from "../factories";
import { analyzeStructure } from "../books/structure-detector";
import {
  buildOutline,
  detectChapters,
  getTableOfContents,
} from "../books/chapter-detector";
import { chunkChapter, estimateChunkCount } from "../utils/chunking";
import { isSupportedBookFile } from "../parsers/text-extractor";

const program = new Command();

program
  .name("analyze-book")
  .description("Detect the structure of a book file without storing anything")
  .argument("<file>", "Path to a PDF, EPUB or TXT file")
  .option("--json", "Print the structure as JSON")
  .option("--toc", "Print the table of contents")
  .option("--chunks", "Print chunk counts per chapter")
  .option("--chunk-size <n>", "Characters per chunk", "1024")
  .option("--overlap <n>", "Characters shared between chunks", "200")
  .action(
    async (
      file: string,
      options: {
        json?: boolean;
        toc?: boolean;
        chunks?: boolean;
        chunkSize: string;
        overlap: string;
      }
    ) => {
      try {
        if (!isSupportedBookFile(file)) {
          console.error(`✗ Unsupported file type: ${basename(file)}`);
          process.exit(1);
        }

        const text = await createTextExtractor().extract(file);
        if (text === null) {
          console.error(`✗ Could not extract text from ${basename(file)}`);
          process.exit(1);
        }

        const structure = analyzeStructure(text);

        if (options.json) {
          console.log(JSON.stringify(structure, null, 2));
        } else {
          const { metadata } = structure;
          console.log(`Title: ${structure.title}`);
          console.log(`Author: ${structure.author}`);
          console.log(
            `Words: ${metadata.wordCount.toLocaleString()} (~${metadata.readingTimeMinutes} min)`
          );
          console.log(`Complexity: ${metadata.complexity.toFixed(2)}`);
          console.log(`Front matter: ${metadata.hasFrontMatter ? "yes" : "no"}`);
          console.log(`Headings: ${structure.headings.length}`);
        }

        if (options.toc) {
          console.log("\nTable of contents:");
          for (const entry of getTableOfContents(buildOutline(structure.headings))) {
            const indent = "  ".repeat(entry.level);
            console.log(`${indent}${entry.title} @ ${entry.position}`);
          }
        }

        if (options.chunks) {
          const chunkSize = parseInt(options.chunkSize, 10) || 1024;
          const chunkOverlap = parseInt(options.overlap, 10) || 0;

          console.log(`\nChunks (size=${chunkSize}, overlap=${chunkOverlap}):`);
          for (const chapter of detectChapters(text, structure)) {
            const chunks = chunkChapter(chapter, { chunkSize, chunkOverlap });
            console.log(`  ${chapter.number}. ${chapter.title}: ${chunks.length}`);
          }
          console.log(
            `  Whole book (estimate): ${estimateChunkCount(text.length, chunkSize, chunkOverlap)}`
          );
        }
      } catch (error) {
        console.error(`\n❌ Analysis failed: ${error instanceof Error ? error.message : String(error)}`);
        process.exit(1);
      }
    }
  );

program.parse();
