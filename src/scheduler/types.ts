import type { TaskNode } from "../tree/types.js";

/** Ready-queue ordering: shortest duration first, or longest first. */
export type Policy = "ascending" | "descending";

export type PolicyVerdict = Policy | "tie";

export const POLICIES: readonly Policy[] = ["ascending", "descending"];

export type TimelineEntry = {
  task: string;
  /** 0-based processor slot the task occupied */
  processor: number;
  start: number;
  end: number;
};

export type ScheduleOptions = {
  onTaskStart?: (task: TaskNode, time: number, processor: number) => void;
  onTaskEnd?: (task: TaskNode, time: number, processor: number) => void;
};

export type ScheduleResult = {
  policy: Policy;
  processorCount: number;
  /** Makespan in simulated time units */
  totalTime: number;
  /** Task names in completion order */
  order: string[];
  timeline: TimelineEntry[];
};

export type TreeSummary = {
  taskCount: number;
  durationSum: number;
  meanDuration: number;
  tasksPerProcessor: number;
};

export type PolicyComparison = TreeSummary & {
  processorCount: number;
  ascending: ScheduleResult;
  descending: ScheduleResult;
  bestPolicy: PolicyVerdict;
};
