export type ErrorCategory = "api" | "network" | "database" | "user" | "system";

export interface CategorizedError {
  category: ErrorCategory;
  /** Safe to show in chat */
  userMessage: string;
  /** Original message, for logs */
  message: string;
}

/**
 * Thrown by command handlers for bad input; its message is shown to the user as is.
 */
export class UserInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UserInputError";
  }
}

export const ERROR_MESSAGES: Record<Exclude<ErrorCategory, "user">, string> = {
  api: "I'm having trouble communicating with the chat service. Please try again later.",
  network: "I'm having connection issues. Please try again later.",
  database: "I couldn't reach your library right now. Please try again later.",
  system: "An unexpected error occurred. Our team has been notified.",
};

export const TIMEOUT_MESSAGE = "The operation timed out. Please try again later.";

/**
 * Map a thrown value onto a category and the message the user sees.
 */
export function categorizeError(error: unknown): CategorizedError {
  const message = error instanceof Error ? error.message : String(error);

  if (error instanceof UserInputError) {
    return { category: "user", userMessage: message, message };
  }

  if (/unauthorized/i.test(message)) {
    return { category: "api", userMessage: ERROR_MESSAGES.api, message };
  }

  if (/timed out|ETIMEDOUT/i.test(message)) {
    return { category: "network", userMessage: TIMEOUT_MESSAGE, message };
  }

  if (/connection|ECONNREFUSED|ECONNRESET/i.test(message)) {
    return { category: "network", userMessage: ERROR_MESSAGES.network, message };
  }

  // better-sqlite3 throws SqliteError; drizzle wraps it in DrizzleQueryError
  if (
    (error instanceof Error &&
      (error.name === "SqliteError" || error.name === "DrizzleQueryError")) ||
    message.includes("SQLITE_")
  ) {
    return { category: "database", userMessage: ERROR_MESSAGES.database, message };
  }

  return { category: "system", userMessage: ERROR_MESSAGES.system, message };
}
