import type { IntervalType } from "../core/types";

export interface LearningInterval {
  type: IntervalType;
  command: string;
  dayOffset: number;
  label: string;
  focus: string;
}

// Ordered by day offset
export const LEARNING_INTERVALS: readonly LearningInterval[] = [
  {
    type: "day1",
    command: "recap",
    dayOffset: 1,
    label: "Core concept reminders",
    focus:
      "Recall: 3-5 key points from the book and simple recall questions about them.",
  },
  {
    type: "day3",
    command: "connect",
    dayOffset: 3,
    label: "Concept connections",
    focus:
      "Connections: how the main concepts relate to each other, with examples and questions that link ideas across chapters.",
  },
  {
    type: "day7",
    command: "apply",
    dayOffset: 7,
    label: "Application prompts",
    focus:
      "Application: real-world scenarios, implementation suggestions and synthesis questions.",
  },
  {
    type: "day30",
    command: "master",
    dayOffset: 30,
    label: "Comprehensive review",
    focus:
      "Mastery: a full review integrating every concept, long-term retention strategies and prompts to teach the ideas to someone else.",
  },
];

export function getInterval(type: IntervalType): LearningInterval {
  const interval = LEARNING_INTERVALS.find((i) => i.type === type);
  if (!interval) {
    throw new Error(`Unknown learning interval: ${type}`);
  }
  return interval;
}

export function getIntervalByCommand(command: string): LearningInterval | null {
  return LEARNING_INTERVALS.find((i) => i.command === command) ?? null;
}
