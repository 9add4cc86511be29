import { describe, it, expect, beforeEach, vi } from "vitest";
import type { LanguageModel } from "ai";
import { ZodError } from "zod";
import { LlmBookAnalyzer } from "../../../src/services/book-analyzer";
import {
  BookSynthesisSchema,
  ChapterAnalysisSchema,
  LearningMaterialSchema,
} from "../../../src/schemas/analysis";
import type { BookSynthesis } from "../../../src/core/types";

// Mock Vercel AI SDK generateObject so we can control LLM output
const { generateObjectMock } = vi.hoisted(() => ({
  generateObjectMock: vi.fn(),
}));

vi.mock("ai", () => ({
  generateObject: generateObjectMock,
}));

// generateObject is mocked, so the model is never called
const testModel: LanguageModel = {
  specificationVersion: "v1",
  provider: "test",
  modelId: "test-model",
  defaultObjectGenerationMode: "json",
  doGenerate: vi.fn(),
  doStream: vi.fn(),
};

const BOOK = { title: "Deep Habits", author: "Ann Lee" };

const SYNTHESIS: BookSynthesis = {
  summaryShort: "Habits compound.",
  summaryDetailed: "A long look at how habits compound.",
  keyThemes: ["compounding", "identity"],
  conceptHierarchy: [{ concept: "Habit loop", subconcepts: ["cue", "reward"] }],
};

describe("LlmBookAnalyzer", () => {
  let analyzer: LlmBookAnalyzer;

  beforeEach(() => {
    generateObjectMock.mockReset();
    analyzer = new LlmBookAnalyzer(testModel, "test/model", {
      chunkSize: 20,
      chunkOverlap: 0,
      maxPromptChars: 40,
      temperature: 0.2,
      maxTokens: 500,
    });
  });

  describe("analyzeChapter", () => {
    it("should return the structured analysis", async () => {
      const analysis = {
        summary: "About cues.",
        keyConcepts: ["cue"],
        mainArguments: ["cues trigger habits"],
        terminology: ["habit loop"],
        importantQuotes: [],
      };
      generateObjectMock.mockResolvedValueOnce({ object: analysis });

      const result = await analyzer.analyzeChapter(
        { number: 1, title: "Cues", content: "Cues start habits." },
        BOOK
      );

      expect(result).toEqual(analysis);
      const call = generateObjectMock.mock.calls[0][0];
      expect(call.model).toBe(testModel);
      expect(call.schema).toBe(ChapterAnalysisSchema);
      expect(call.temperature).toBe(0.2);
      expect(call.maxTokens).toBe(500);
    });

    it("should include book context and chapter text in the prompt", async () => {
      generateObjectMock.mockResolvedValueOnce({ object: {} });

      await analyzer.analyzeChapter(
        { number: 1, title: "Cues", content: "Cues start habits." },
        BOOK
      );

      const prompt = String(generateObjectMock.mock.calls[0][0].prompt);
      expect(prompt).toContain("Title: Deep Habits");
      expect(prompt).toContain("Author: Ann Lee");
      expect(prompt).toContain("Title: Cues");
      expect(prompt).toContain("[Part 1]\nCues start habits.");
      expect(prompt).not.toContain("omitted for length");
    });

    it("should drop chunks beyond the prompt budget", async () => {
      generateObjectMock.mockResolvedValueOnce({ object: {} });

      // Three 17-char sentences, one chunk each; the budget fits two
      const [a, b, c] = ["a", "b", "c"].map(
        (ch) => `${ch.toUpperCase()}${ch.repeat(15)}.`
      );
      await analyzer.analyzeChapter(
        { number: 2, title: "Long", content: `${a} ${b} ${c}` },
        BOOK
      );

      const prompt = String(generateObjectMock.mock.calls[0][0].prompt);
      expect(prompt).toContain(`[Part 1]\n${a}`);
      expect(prompt).toContain(`[Part 2]\n${b}`);
      expect(prompt).not.toContain(c);
      expect(prompt).toContain("[1 further part(s) omitted for length]");
    });

    it("should propagate validation errors", async () => {
      generateObjectMock.mockRejectedValueOnce(new ZodError([]));

      await expect(
        analyzer.analyzeChapter({ number: 1, title: "X", content: "Text." }, BOOK)
      ).rejects.toThrow(ZodError);
    });
  });

  describe("synthesizeBook", () => {
    it("should send every chapter summary", async () => {
      generateObjectMock.mockResolvedValueOnce({ object: SYNTHESIS });

      const result = await analyzer.synthesizeBook(BOOK, [
        {
          title: "Cues",
          summary: "About cues.",
          keyConcepts: ["cue", "trigger"],
          mainArguments: [],
          terminology: [],
          importantQuotes: [],
        },
      ]);

      expect(result).toEqual(SYNTHESIS);
      const call = generateObjectMock.mock.calls[0][0];
      expect(call.schema).toBe(BookSynthesisSchema);
      expect(String(call.prompt)).toContain(
        "Chapter 1: Cues\nSummary: About cues.\nKey concepts: cue, trigger"
      );
    });
  });

  describe("generateLearningMaterial", () => {
    it("should describe the interval in the prompt", async () => {
      const material = {
        headline: "Day one",
        keyPoints: ["compounding"],
        questions: [{ question: "What compounds?", answer: "Habits." }],
      };
      generateObjectMock.mockResolvedValueOnce({ object: material });

      const result = await analyzer.generateLearningMaterial("day7", BOOK, SYNTHESIS);

      expect(result).toEqual(material);
      const call = generateObjectMock.mock.calls[0][0];
      expect(call.schema).toBe(LearningMaterialSchema);
      const prompt = String(call.prompt);
      expect(prompt).toContain("Session: Day 7 - Application prompts");
      expect(prompt).toContain("- Habit loop: cue, reward");
      expect(prompt).toContain("Themes: compounding, identity");
    });
  });
});
