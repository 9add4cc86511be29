#!/usr/bin/env node

import { Command } from "commander";
import { readFileSync } from "fs";
import { basename } from "path";
import { loadConfig } from "../config";
import { createBookProcessor, createDatabase } from "../factories";
import { createUser, getUser } from "../api/users";
import { closeDatabase } from "../db/client";

const program = new Command();

program
  .name("process-book")
  .description("Run a book file through the full processing pipeline")
  .argument("<file>", "Path to a PDF, EPUB or TXT file")
  .requiredOption("-u, --user <id>", "Chat user id that owns the book (created if missing)")
  .option("-c, --config <path>", "Path to config file", "./config.json")
  .option("--no-analyze", "Stop after storing chapters (no LLM calls)")
  .action(
    async (
      file: string,
      options: { user: string; config: string; analyze: boolean }
    ) => {
      try {
        const config = loadConfig(options.config);
        const db = createDatabase(config.db.path);

        const user =
          getUser(db, options.user) ?? createUser(db, { chatUserId: options.user });

        const processor = createBookProcessor(config, db, {
          ...(options.analyze ? {} : { analyzer: null }),
          onProgress: (entry) => console.log(`  ✓ ${entry.step} (${entry.durationMs}ms)`),
          onError: (fileName, error) => console.log(`  ✗ ${fileName}: ${error.message}`),
        });

        const fileName = basename(file);
        console.log(`Processing: ${fileName}...`);

        const result = await processor.processUpload({
          userId: user.id,
          userKey: user.chatUserId,
          fileName,
          content: readFileSync(file),
        });

        closeDatabase(db);

        if (!result) {
          console.log(`\n✗ Processing failed for ${fileName}`);
          process.exit(1);
        }

        console.log(`\n✓ Complete: book ${result.bookId}`);
        console.log(`  Title: ${result.title}`);
        console.log(`  Author: ${result.author}`);
        console.log(`  Chapters: ${result.chapterCount}`);
        process.exit(0);
      } catch (error) {
        console.error(`\n❌ Processing failed: ${error instanceof Error ? error.message : String(error)}`);
        process.exit(1);
      }
    }
  );

program.parse();
