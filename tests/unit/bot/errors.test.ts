import { describe, it, expect } from "vitest";
import {
  categorizeError,
  ERROR_MESSAGES,
  TIMEOUT_MESSAGE,
  UserInputError,
} from "../../../src/bot/errors";

describe("categorizeError", () => {
  it("should pass user input errors through", () => {
    expect(categorizeError(new UserInputError("Please provide a book ID."))).toEqual({
      category: "user",
      userMessage: "Please provide a book ID.",
      message: "Please provide a book ID.",
    });
  });

  it("should classify authorization failures as api errors", () => {
    const result = categorizeError(new Error("401 Unauthorized"));
    expect(result.category).toBe("api");
    expect(result.userMessage).toBe(ERROR_MESSAGES.api);
  });

  it("should classify timeouts as network errors", () => {
    const result = categorizeError(new Error("Request timed out after 30s"));
    expect(result.category).toBe("network");
    expect(result.userMessage).toBe(TIMEOUT_MESSAGE);
  });

  it("should classify connection failures as network errors", () => {
    const result = categorizeError(new Error("connect ECONNREFUSED 127.0.0.1:443"));
    expect(result.category).toBe("network");
    expect(result.userMessage).toBe(ERROR_MESSAGES.network);
  });

  it("should classify SQLite errors as database errors", () => {
    const error = new Error("SQLITE_BUSY: database is locked");
    expect(categorizeError(error).category).toBe("database");

    const named = new Error("no such table: books");
    named.name = "SqliteError";
    expect(categorizeError(named).category).toBe("database");
  });

  it("should fall back to a system error", () => {
    expect(categorizeError("boom")).toEqual({
      category: "system",
      userMessage: ERROR_MESSAGES.system,
      message: "boom",
    });
  });
});
