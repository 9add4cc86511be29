import { readFileSync } from "fs";
import { resolve } from "path";
import { config as dotenvConfig } from "dotenv";
import { Config } from "./core/types";

// Load environment variables from .env file
dotenvConfig();

/**
 * Load and validate configuration from config.json
 * The API key and books directory can be overridden with environment variables
 */
export function loadConfig(configPath?: string): Config {
  const path = configPath || resolve(process.cwd(), "config.json");

  try {
    const content = readFileSync(path, "utf-8");
    const config = JSON.parse(content) as Config;

    if (process.env.OPENROUTER_API_KEY && config.llm) {
      config.llm.apiKey = process.env.OPENROUTER_API_KEY;
    }

    if (process.env.BOOKS_DIR && config.storage) {
      config.storage.booksDir = process.env.BOOKS_DIR;
    }

    validateConfig(config);

    return config;
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      throw new Error(`Config file not found at: ${path}`);
    }
    throw error;
  }
}

/**
 * Validate configuration object
 */
export function validateConfig(config: Config): void {
  if (!config.llm) {
    throw new Error("Missing llm configuration");
  }

  if (config.llm.provider !== "openrouter" && config.llm.provider !== "mock") {
    throw new Error(`Unknown llm.provider: ${String(config.llm.provider)}`);
  }

  if (!config.llm.model) {
    throw new Error("Missing llm.model");
  }

  if (
    config.llm.provider === "openrouter" &&
    (!config.llm.apiKey || config.llm.apiKey === "YOUR_API_KEY_HERE")
  ) {
    throw new Error(
      "Missing llm.apiKey - please set OPENROUTER_API_KEY in .env file or update config.json"
    );
  }

  if (!config.db) {
    throw new Error("Missing db configuration");
  }

  if (!config.db.path) {
    throw new Error("Missing db.path");
  }

  if (!config.storage) {
    throw new Error("Missing storage configuration");
  }

  if (!config.storage.booksDir) {
    throw new Error("Missing storage.booksDir");
  }

  if (!config.processing) {
    throw new Error("Missing processing configuration");
  }

  const { chunkSize, chunkOverlap, concurrency, maxPromptChars } =
    config.processing;

  if (!chunkSize || chunkSize <= 0) {
    throw new Error("Invalid processing.chunkSize");
  }

  if (chunkOverlap < 0 || chunkOverlap >= chunkSize) {
    throw new Error(
      "Invalid processing.chunkOverlap - must be between 0 and chunkSize"
    );
  }

  if (!concurrency || concurrency <= 0) {
    throw new Error("Invalid processing.concurrency");
  }

  if (!maxPromptChars || maxPromptChars <= 0) {
    throw new Error("Invalid processing.maxPromptChars");
  }
}

/**
 * Create a default config object (useful for testing)
 */
export function createDefaultConfig(overrides?: Partial<Config>): Config {
  const defaults: Config = {
    llm: {
      provider: "mock",
      model: "anthropic/claude-3.5-sonnet",
      temperature: 0.3,
      maxTokens: 4000,
    },
    db: {
      path: "./data/book_retention.db",
    },
    storage: {
      booksDir: "./data/books",
    },
    processing: {
      chunkSize: 1024,
      chunkOverlap: 200,
      concurrency: 3,
      maxPromptChars: 12000,
    },
  };

  if (!overrides) return defaults;

  return {
    ...defaults,
    ...overrides,
    llm: { ...defaults.llm, ...overrides.llm },
    db: { ...defaults.db, ...overrides.db },
    storage: { ...defaults.storage, ...overrides.storage },
    processing: { ...defaults.processing, ...overrides.processing },
  };
}
