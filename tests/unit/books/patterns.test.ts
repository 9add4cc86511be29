import { describe, it, expect } from "vitest";
import {
  CHAPTER_START_TOKENS,
  HEADING_PATTERNS,
  matchHeading,
} from "../../../src/books/patterns";

describe("matchHeading", () => {
  it("should match chapter headings with a title suffix", () => {
    expect(matchHeading("Chapter 3 - Dawn")).toEqual({
      type: "chapter",
      number: "3",
      title: "Dawn",
    });
    expect(matchHeading("CHAPTER IV: The Return")).toEqual({
      type: "chapter",
      number: "IV",
      title: "The Return",
    });
  });

  it("should name untitled chapters after their number", () => {
    expect(matchHeading("Chapter 12")).toEqual({
      type: "chapter",
      number: "12",
      title: "Chapter 12",
    });
  });

  it("should match sections", () => {
    expect(matchHeading("SECTION 2. Methods")).toEqual({
      type: "section",
      number: "2",
      title: "Methods",
    });
  });

  it("should match numbered headings as chapters", () => {
    expect(matchHeading("7. Closing Thoughts")).toEqual({
      type: "chapter",
      number: "7",
      title: "Closing Thoughts",
    });
  });

  it("should reject prose", () => {
    expect(matchHeading("The chapter begins quietly.")).toBeNull();
    expect(matchHeading("Chapter Introduction")).toBeNull();
    expect(matchHeading("")).toBeNull();
  });
});

describe("pattern tables", () => {
  it("should try chapter patterns before sections and numbered lines", () => {
    expect(HEADING_PATTERNS.map((p) => p.name)).toEqual([
      "chapter",
      "section",
      "numbered",
    ]);
  });

  it("should list chapter-start tokens in lookup order", () => {
    expect(CHAPTER_START_TOKENS[0]).toBe("Chapter 1");
    expect(CHAPTER_START_TOKENS).toContain("PART 1");
  });
});
