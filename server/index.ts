import { config as dotenvConfig } from "dotenv";
import { resolve, dirname, isAbsolute } from "path";
import { fileURLToPath } from "url";

// Load .env from project root (parent of server/)
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const projectRoot = resolve(__dirname, "..");
dotenvConfig({ path: resolve(projectRoot, ".env") });

import { loadConfig } from "../src/config";
import { createCommandRouter, createDatabase } from "../src/factories";
import { createApp } from "./app";

const config = loadConfig(resolve(projectRoot, "config.json"));

// Resolve data paths relative to project root
const dbPath = resolve(projectRoot, config.db.path);
if (!isAbsolute(config.storage.booksDir)) {
  config.storage.booksDir = resolve(projectRoot, config.storage.booksDir);
}

const db = createDatabase(dbPath);
const router = createCommandRouter(config, db);
const app = createApp(router, { corsOrigin: config.server?.cors?.origin });

const PORT = config.server?.port || 3001;
const HOST = config.server?.host || "localhost";
app.listen(PORT, HOST, () => {
  console.log(`📚 Book Retention Bot API running on http://${HOST}:${PORT}`);
  console.log(`📊 Database: ${dbPath}`);
  console.log(`📁 Books: ${config.storage.booksDir}`);
  console.log(`🤖 LLM: ${config.llm.provider} (${config.llm.model})`);
});
