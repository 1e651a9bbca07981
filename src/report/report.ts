import { getConfig } from "../config.js";
import { summarizeTree } from "../scheduler/comparator.js";
import type { PolicyComparison, ScheduleResult, TimelineEntry } from "../scheduler/types.js";
import type { LoadedTree } from "../tree/types.js";
import type { ComparisonReport, Report, RunReport } from "./types.js";

/** Round to `report.decimals` places (2 by default), halves to the even digit. */
export function roundRatio(value: number, decimals = getConfig().report.decimals): number {
  const factor = 10 ** decimals;
  const scaled = value * factor;
  const floor = Math.floor(scaled);
  if (scaled - floor === 0.5) {
    return (floor % 2 === 0 ? floor : floor + 1) / factor;
  }
  return Math.round(scaled) / factor;
}

export function buildRunReport(loaded: LoadedTree, result: ScheduleResult): RunReport {
  const summary = summarizeTree(loaded.tree, result.processorCount);
  return {
    kind: "run",
    source: loaded.source,
    processors: result.processorCount,
    policy: result.policy,
    taskCount: summary.taskCount,
    durationSum: summary.durationSum,
    makespan: result.totalTime,
    tasksPerProcessor: roundRatio(summary.tasksPerProcessor),
    meanDuration: roundRatio(summary.meanDuration),
  };
}

export function buildComparisonReport(loaded: LoadedTree, comparison: PolicyComparison): ComparisonReport {
  return {
    kind: "comparison",
    source: loaded.source,
    processors: comparison.processorCount,
    taskCount: comparison.taskCount,
    durationSum: comparison.durationSum,
    ascendingMakespan: comparison.ascending.totalTime,
    descendingMakespan: comparison.descending.totalTime,
    bestPolicy: comparison.bestPolicy,
    tasksPerProcessor: roundRatio(comparison.tasksPerProcessor),
    meanDuration: roundRatio(comparison.meanDuration),
  };
}

export function formatRunReport(report: RunReport): string {
  return [
    `Source:          ${report.source}`,
    `Processors:      ${report.processors}`,
    `Policy:          ${report.policy}`,
    `Tasks:           ${report.taskCount}`,
    `Duration sum:    ${report.durationSum}`,
    `Makespan:        ${report.makespan}`,
    `Tasks/processor: ${report.tasksPerProcessor}`,
    `Mean duration:   ${report.meanDuration}`,
  ].join("\n");
}

const COMPARISON_COLUMNS: Array<{ title: string; value: (r: ComparisonReport) => string }> = [
  { title: "source", value: (r) => r.source },
  { title: "procs", value: (r) => String(r.processors) },
  { title: "tasks", value: (r) => String(r.taskCount) },
  { title: "sum", value: (r) => String(r.durationSum) },
  { title: "ascending", value: (r) => String(r.ascendingMakespan) },
  { title: "descending", value: (r) => String(r.descendingMakespan) },
  { title: "best", value: (r) => r.bestPolicy },
  { title: "tasks/proc", value: (r) => String(r.tasksPerProcessor) },
  { title: "mean", value: (r) => String(r.meanDuration) },
];

/** Fixed-width table, one row per comparison, columns separated by two spaces. */
export function formatComparisonTable(reports: ComparisonReport[]): string {
  const rows = [
    COMPARISON_COLUMNS.map((c) => c.title),
    ...reports.map((r) => COMPARISON_COLUMNS.map((c) => c.value(r))),
  ];
  const widths = COMPARISON_COLUMNS.map((_, i) => Math.max(...rows.map((row) => row[i].length)));
  return rows
    .map((row) => row.map((cell, i) => cell.padEnd(widths[i])).join("  ").trimEnd())
    .join("\n");
}

/** One line per processor listing `name[start-end]` in start order. */
export function formatTimeline(timeline: TimelineEntry[]): string {
  const byProcessor = new Map<number, TimelineEntry[]>();
  for (const entry of timeline) {
    const list = byProcessor.get(entry.processor) ?? [];
    list.push(entry);
    byProcessor.set(entry.processor, list);
  }
  return [...byProcessor.keys()]
    .sort((a, b) => a - b)
    .map((processor) => {
      const entries = (byProcessor.get(processor) ?? []).slice().sort((a, b) => a.start - b.start);
      return `P${processor}: ${entries.map((e) => `${e.task}[${e.start}-${e.end}]`).join(" ")}`;
    })
    .join("\n");
}

export function describeReport(report: Report): string {
  return report.kind === "run"
    ? `${report.source}: ${report.policy} makespan ${report.makespan}`
    : `${report.source}: ascending ${report.ascendingMakespan}, descending ${report.descendingMakespan}, best ${report.bestPolicy}`;
}
