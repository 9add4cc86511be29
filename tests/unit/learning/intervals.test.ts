import { describe, it, expect } from "vitest";
import {
  getInterval,
  getIntervalByCommand,
  LEARNING_INTERVALS,
} from "../../../src/learning/intervals";
import { INTERVAL_TYPES } from "../../../src/db/schema";

describe("learning intervals", () => {
  it("should cover every stored interval type in day order", () => {
    expect(LEARNING_INTERVALS.map((i) => i.type)).toEqual([...INTERVAL_TYPES]);
    expect(LEARNING_INTERVALS.map((i) => i.dayOffset)).toEqual([1, 3, 7, 30]);
  });

  it("should look up intervals by chat command", () => {
    expect(getIntervalByCommand("connect")?.type).toBe("day3");
    expect(getIntervalByCommand("master")?.label).toBe("Comprehensive review");
    expect(getIntervalByCommand("quiz")).toBeNull();
  });

  it("should look up intervals by type", () => {
    expect(getInterval("day1").command).toBe("recap");
  });
});
