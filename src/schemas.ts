import { z } from "zod";
import { InvalidConfigurationError } from "./errors.js";
import type { ComparisonReport, Report, RunReport } from "./report/types.js";
import type { Policy } from "./scheduler/types.js";

const POLICY_ALIASES = new Map<string, Policy>([
  ["ascending", "ascending"],
  ["asc", "ascending"],
  ["min", "ascending"],
  ["descending", "descending"],
  ["desc", "descending"],
  ["max", "descending"],
]);

/** Policy name, accepting the short forms asc/desc and min/max. */
export const PolicySchema = z.string().transform((val, ctx): Policy => {
  const policy = POLICY_ALIASES.get(val.trim().toLowerCase());
  if (!policy) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `unknown policy "${val}" (expected ascending or descending)`,
    });
    return z.NEVER;
  }
  return policy;
});

export const PositiveIntSchema = z.coerce.number().int().min(1);

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

export const ConfigOverridesSchema = z
  .object({
    loader: z
      .object({
        defaultProcessors: z.number().int().min(1),
        encoding: z.enum(["utf8", "utf-8", "latin1", "ascii", "utf16le"]),
      })
      .partial()
      .strict()
      .optional(),
    report: z
      .object({ decimals: z.number().int().min(0).max(10) })
      .partial()
      .strict()
      .optional(),
    store: z
      .object({
        path: z.string().min(1),
        historyLimit: z.number().int().min(1),
      })
      .partial()
      .strict()
      .optional(),
    log: z.object({ level: LogLevelSchema }).partial().strict().optional(),
  })
  .strict();

export type ConfigOverrides = z.infer<typeof ConfigOverridesSchema>;

const reportBase = {
  source: z.string(),
  processors: z.number().int().min(1),
  taskCount: z.number().int().min(0),
  durationSum: z.number().int().min(0),
  tasksPerProcessor: z.number(),
  meanDuration: z.number(),
};

export const RunReportSchema: z.ZodType<RunReport> = z.object({
  kind: z.literal("run"),
  ...reportBase,
  policy: z.enum(["ascending", "descending"]),
  makespan: z.number().int().min(0),
});

export const ComparisonReportSchema: z.ZodType<ComparisonReport> = z.object({
  kind: z.literal("comparison"),
  ...reportBase,
  ascendingMakespan: z.number().int().min(0),
  descendingMakespan: z.number().int().min(0),
  bestPolicy: z.enum(["ascending", "descending", "tie"]),
});

export const ReportSchema: z.ZodType<Report> = z.union([RunReportSchema, ComparisonReportSchema]);

/** Validate `value` or throw an InvalidConfigurationError naming each issue. */
export function parseOrThrow<S extends z.ZodTypeAny>(schema: S, value: unknown, label: string): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "value"}: ${issue.message}`)
      .join("; ");
    throw new InvalidConfigurationError(`Invalid ${label}: ${detail}`, { cause: result.error });
  }
  return result.data;
}
