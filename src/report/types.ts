import type { Policy, PolicyVerdict } from "../scheduler/types.js";

type ReportBase = {
  source: string;
  processors: number;
  taskCount: number;
  durationSum: number;
  /** Tasks per processor, rounded */
  tasksPerProcessor: number;
  /** Mean task duration, rounded */
  meanDuration: number;
};

/** Result record of a single scheduling run. */
export type RunReport = ReportBase & {
  kind: "run";
  policy: Policy;
  makespan: number;
};

/** Result record of running both policies on one tree. */
export type ComparisonReport = ReportBase & {
  kind: "comparison";
  ascendingMakespan: number;
  descendingMakespan: number;
  bestPolicy: PolicyVerdict;
};

export type Report = RunReport | ComparisonReport;

export type StoredReport = {
  id: number;
  createdAt: number;
  report: Report;
};
