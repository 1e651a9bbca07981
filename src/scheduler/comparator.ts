import { collectTasks } from "../tree/task-tree.js";
import type { TaskTree } from "../tree/types.js";
import { assertProcessorCount, schedule } from "./engine.js";
import type { PolicyComparison, PolicyVerdict, TreeSummary } from "./types.js";

/** Task count, duration totals and load ratio of a tree. Values are unrounded. */
export function summarizeTree(tree: TaskTree, processorCount: number): TreeSummary {
  assertProcessorCount(processorCount);
  const tasks = collectTasks(tree);
  const taskCount = tasks.length;
  const durationSum = tasks.reduce((sum, t) => sum + t.duration, 0);
  return {
    taskCount,
    durationSum,
    meanDuration: taskCount > 0 ? durationSum / taskCount : 0,
    tasksPerProcessor: taskCount / processorCount,
  };
}

/** The policy with the lower makespan, or "tie" when both are equal. */
export function pickBestPolicy(ascendingTime: number, descendingTime: number): PolicyVerdict {
  if (ascendingTime === descendingTime) return "tie";
  return ascendingTime > descendingTime ? "descending" : "ascending";
}

/** Schedule the same tree under both policies and compare their makespans. */
export function comparePolicies(tree: TaskTree, processorCount: number): PolicyComparison {
  const ascending = schedule(tree, processorCount, "ascending");
  const descending = schedule(tree, processorCount, "descending");
  return {
    ...summarizeTree(tree, processorCount),
    processorCount,
    ascending,
    descending,
    bestPolicy: pickBestPolicy(ascending.totalTime, descending.totalTime),
  };
}
