import express, { type ErrorRequestHandler } from "express";
import cors from "cors";
import multer from "multer";
import { z } from "zod";
import type { CommandRouter } from "../src/bot/command-router";

export const ChatMessageBodySchema = z.object({
  user: z.object({
    id: z.string().min(1),
    username: z.string().optional(),
    firstName: z.string().optional(),
    lastName: z.string().optional(),
  }),
  text: z.string(),
});

export const DocumentFieldsSchema = z.object({
  userId: z.string().min(1),
  username: z.string().optional(),
  firstName: z.string().optional(),
});

export interface AppOptions {
  corsOrigin?: string;
  /** Upload size limit in bytes (default 50 MB) */
  maxUploadBytes?: number;
}

/**
 * HTTP front end for the chat router. Every chat route answers `{ replies }`.
 */
export function createApp(router: CommandRouter, options: AppOptions = {}) {
  const app = express();
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: options.maxUploadBytes ?? 50 * 1024 * 1024 },
  });

  app.use(cors(options.corsOrigin ? { origin: options.corsOrigin } : undefined));
  app.use(express.json());

  app.get("/api/health", (req, res) => {
    res.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  // Text message or command
  app.post("/api/messages", async (req, res) => {
    const parsed = ChatMessageBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({
        error: 'Invalid message: expected { user: { id }, text }',
      });
    }

    try {
      const replies = await router.handle(parsed.data);
      res.json({ replies });
    } catch (error) {
      console.error("Error in /api/messages:", error);
      res.status(500).json({
        error: error instanceof Error ? error.message : "Internal server error",
      });
    }
  });

  // Book upload (multipart, file field "file")
  app.post("/api/documents", upload.single("file"), async (req, res) => {
    const fields = DocumentFieldsSchema.safeParse(req.body);
    if (!fields.success) {
      return res.status(400).json({ error: 'Missing or invalid "userId" field' });
    }
    if (!req.file) {
      return res.status(400).json({ error: 'Missing "file" upload' });
    }

    try {
      const replies = await router.handle({
        user: {
          id: fields.data.userId,
          username: fields.data.username,
          firstName: fields.data.firstName,
        },
        document: {
          fileName: req.file.originalname,
          content: req.file.buffer,
        },
      });
      res.json({ replies });
    } catch (error) {
      console.error("Error in /api/documents:", error);
      res.status(500).json({
        error: error instanceof Error ? error.message : "Internal server error",
      });
    }
  });

  // Upload and body-parser failures, plus anything a route let through
  const handleErrors: ErrorRequestHandler = (err, req, res, next) => {
    if (res.headersSent) {
      return next(err);
    }
    if (err instanceof multer.MulterError) {
      return res.status(400).json({ error: err.message });
    }
    if (err instanceof SyntaxError) {
      return res.status(400).json({ error: "Malformed JSON body" });
    }

    console.error(`Error in ${req.method} ${req.path}:`, err);
    res.status(500).json({ error: "Internal server error" });
  };
  app.use(handleErrors);

  return app;
}
