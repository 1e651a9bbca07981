import { DeadlockError, InvalidConfigurationError } from "../errors.js";
import { collectTasks, getTask, validateTree } from "../tree/task-tree.js";
import type { TaskId, TaskNode, TaskTree } from "../tree/types.js";
import { createLogger } from "../utils/logger.js";
import type { Policy, ScheduleOptions, ScheduleResult, TimelineEntry } from "./types.js";

const log = createLogger("engine");

type RunningTask = {
  node: TaskNode;
  remaining: number;
  processor: number;
  start: number;
};

export function assertProcessorCount(processorCount: number): void {
  if (!Number.isInteger(processorCount) || processorCount < 1) {
    throw new InvalidConfigurationError(`processor count must be a positive integer, got ${processorCount}`);
  }
}

function byDuration(policy: Policy): (a: TaskNode, b: TaskNode) => number {
  return policy === "ascending"
    ? (a, b) => a.duration - b.duration
    : (a, b) => b.duration - a.duration;
}

function lowestFreeSlot(busy: Set<number>): number {
  let slot = 0;
  while (busy.has(slot)) slot++;
  return slot;
}

/**
 * Non-preemptive greedy list scheduling of a task tree.
 *
 * Ready tasks are stably sorted by duration according to `policy` and admitted
 * while processors are free; simulated time then jumps straight to the next
 * completion. Completed tasks release their children onto the ready queue in
 * admission order, which is what decides later ties.
 */
export function schedule(
  tree: TaskTree,
  processorCount: number,
  policy: Policy,
  opts?: ScheduleOptions,
): ScheduleResult {
  assertProcessorCount(processorCount);
  validateTree(tree);

  const tasks = collectTasks(tree);
  // Each task has at most one parent, so this is a 0/1 readiness flag
  const unmet = new Map<TaskId, number>();
  for (const task of tasks) unmet.set(task.id, task.parent === null ? 0 : 1);

  const ready: TaskNode[] = tasks.filter((t) => unmet.get(t.id) === 0);
  let running: RunningTask[] = [];
  const busy = new Set<number>();
  const order: string[] = [];
  const finished = new Set<TaskId>();
  const timeline: TimelineEntry[] = [];
  const compare = byDuration(policy);
  let totalTime = 0;
  let iterations = 0;

  while (ready.length > 0 || running.length > 0) {
    // Every pass completes at least one task
    if (++iterations > tasks.length) {
      throw deadlock(tasks, finished, "iteration limit exceeded");
    }

    ready.sort(compare);
    while (running.length < processorCount && ready.length > 0) {
      const node = ready.shift();
      if (node === undefined) break;
      const processor = lowestFreeSlot(busy);
      busy.add(processor);
      running.push({ node, remaining: node.duration, processor, start: totalTime });
      log.debug("Task started", { task: node.name, time: totalTime, processor });
      opts?.onTaskStart?.(node, totalTime, processor);
    }

    if (running.length === 0) break;

    const delta = running.reduce((min, r) => Math.min(min, r.remaining), Number.POSITIVE_INFINITY);
    totalTime += delta;
    for (const r of running) r.remaining -= delta;

    const completed = running.filter((r) => r.remaining === 0);
    running = running.filter((r) => r.remaining > 0);

    for (const done of completed) {
      order.push(done.node.name);
      finished.add(done.node.id);
      busy.delete(done.processor);
      timeline.push({ task: done.node.name, processor: done.processor, start: done.start, end: totalTime });
      log.debug("Task finished", { task: done.node.name, time: totalTime, processor: done.processor });
      opts?.onTaskEnd?.(done.node, totalTime, done.processor);

      for (const childId of done.node.children) {
        const left = (unmet.get(childId) ?? 0) - 1;
        unmet.set(childId, left);
        if (left === 0) ready.push(getTask(tree, childId));
      }
    }
  }

  if (order.length !== tasks.length) {
    throw deadlock(tasks, finished, "no task is ready or running");
  }

  return { policy, processorCount, totalTime, order, timeline };
}

function deadlock(tasks: TaskNode[], finished: Set<TaskId>, reason: string): DeadlockError {
  const pending = tasks.filter((t) => !finished.has(t.id)).map((t) => t.name);
  return new DeadlockError(
    `scheduling stopped with ${pending.length} unfinished task(s): ${reason}`,
    pending,
  );
}
