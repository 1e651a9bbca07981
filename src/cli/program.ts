import { Command, CommanderError } from "commander";
import { readFile } from "node:fs/promises";
import { configure, getConfig } from "../config.js";
import { InvalidConfigurationError, isSchedulerError } from "../errors.js";
import { ReportStore } from "../persistence/store.js";
import {
  buildComparisonReport,
  buildRunReport,
  describeReport,
  formatComparisonTable,
  formatRunReport,
  formatTimeline,
} from "../report/report.js";
import type { ComparisonReport, Report } from "../report/types.js";
import { ConfigOverridesSchema, parseOrThrow, PolicySchema, PositiveIntSchema } from "../schemas.js";
import { comparePolicies } from "../scheduler/comparator.js";
import { schedule } from "../scheduler/engine.js";
import { loadTreeFile } from "../tree/loader.js";
import { formatTreeOutline, toDot } from "../tree/printer.js";
import { log, setLogLevel } from "../utils/logger.js";

export type CliIO = {
  out: (text: string) => void;
  err: (text: string) => void;
};

const defaultIO: CliIO = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
};

type GlobalOptions = {
  debug?: boolean;
  config?: string;
  db?: string;
};

type RunCommandOptions = {
  policy: string;
  timeline?: boolean;
  json?: boolean;
  save?: boolean;
};

type CompareCommandOptions = {
  json?: boolean;
  save?: boolean;
};

type TreeCommandOptions = {
  format: string;
};

type HistoryCommandOptions = {
  limit?: string;
  json?: boolean;
};

async function applyConfigFile(path: string): Promise<void> {
  const text = await readFile(path, "utf8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new InvalidConfigurationError(`Config file ${path} is not valid JSON`, { cause: err });
  }
  configure(parseOrThrow(ConfigOverridesSchema, raw, `config file ${path}`));
}

function saveReports(globals: GlobalOptions, reports: Report[]): void {
  const store = new ReportStore(globals.db);
  try {
    for (const report of reports) {
      const id = store.insert(report);
      log.info("Report saved", { id, source: report.source, kind: report.kind });
    }
  } finally {
    store.close();
  }
}

export function createProgram(io: CliIO = defaultIO): Command {
  const program = new Command();

  program
    .name("task-tree-scheduler")
    .description("Simulate list scheduling of task trees on identical processors")
    .version("0.1.0")
    .option("--debug", "Enable debug logging")
    .option("--config <file>", "JSON file with config overrides")
    .option("--db <path>", "Report history database")
    .exitOverride()
    .configureOutput({
      writeOut: (str) => io.out(str.trimEnd()),
      writeErr: (str) => io.err(str.trimEnd()),
    });

  program.hook("preAction", async (_cmd, actionCmd) => {
    const opts = actionCmd.optsWithGlobals<GlobalOptions>();
    if (opts.config) await applyConfigFile(opts.config);
    setLogLevel(opts.debug ? "debug" : getConfig().log.level);
  });

  // --- run ---
  program
    .command("run")
    .description("Schedule a task tree under one policy")
    .argument("<file>", "Edge-list file")
    .requiredOption("-p, --policy <policy>", "ascending|descending (or asc/desc, min/max)")
    .option("--timeline", "Print the per-processor timeline")
    .option("--json", "Print the report as JSON")
    .option("--save", "Store the report in the history database")
    .action(async (file: string, opts: RunCommandOptions, cmd: Command) => {
      const policy = parseOrThrow(PolicySchema, opts.policy, "policy");
      const loaded = await loadTreeFile(file);
      const result = schedule(loaded.tree, loaded.processorCount, policy);
      const report = buildRunReport(loaded, result);

      if (opts.json) {
        const payload = opts.timeline
          ? { report, order: result.order, timeline: result.timeline }
          : { report, order: result.order };
        io.out(JSON.stringify(payload, null, 2));
      } else {
        io.out(formatRunReport(report));
        io.out(`Order:           ${result.order.join(", ")}`);
        if (opts.timeline) io.out(formatTimeline(result.timeline));
      }

      if (opts.save) saveReports(cmd.optsWithGlobals<GlobalOptions>(), [report]);
    });

  // --- compare ---
  program
    .command("compare")
    .description("Compare ascending and descending policies on one or more task trees")
    .argument("<files...>", "Edge-list files")
    .option("--json", "Print the reports as JSON")
    .option("--save", "Store the reports in the history database")
    .action(async (files: string[], opts: CompareCommandOptions, cmd: Command) => {
      const reports: ComparisonReport[] = [];
      for (const file of files) {
        const loaded = await loadTreeFile(file);
        reports.push(buildComparisonReport(loaded, comparePolicies(loaded.tree, loaded.processorCount)));
      }

      io.out(opts.json ? JSON.stringify(reports, null, 2) : formatComparisonTable(reports));
      if (opts.save) saveReports(cmd.optsWithGlobals<GlobalOptions>(), reports);
    });

  // --- tree ---
  program
    .command("tree")
    .description("Print a task tree")
    .argument("<file>", "Edge-list file")
    .option("-f, --format <format>", "outline|dot", "outline")
    .action(async (file: string, opts: TreeCommandOptions) => {
      if (opts.format !== "outline" && opts.format !== "dot") {
        throw new InvalidConfigurationError(`Unknown tree format "${opts.format}" (expected outline or dot)`);
      }
      const loaded = await loadTreeFile(file);
      io.out(opts.format === "dot" ? toDot(loaded.tree, loaded.source) : formatTreeOutline(loaded.tree));
    });

  // --- history ---
  program
    .command("history")
    .description("List stored reports, newest first")
    .option("-l, --limit <n>", "Maximum number of reports")
    .option("--json", "Print the stored reports as JSON")
    .action((opts: HistoryCommandOptions, cmd: Command) => {
      const limit = opts.limit === undefined
        ? getConfig().store.historyLimit
        : parseOrThrow(PositiveIntSchema, opts.limit, "limit");
      const store = new ReportStore(cmd.optsWithGlobals<GlobalOptions>().db);
      try {
        const entries = store.list(limit);
        if (opts.json) {
          io.out(JSON.stringify(entries, null, 2));
        } else if (entries.length === 0) {
          io.out("No stored reports.");
        } else {
          for (const entry of entries) {
            io.out(`#${entry.id}  ${new Date(entry.createdAt).toISOString()}  ${describeReport(entry.report)}`);
          }
        }
      } finally {
        store.close();
      }
    });

  return program;
}

/** Parse `argv` (user arguments only) and run the command. Resolves to an exit code. */
export async function runCli(argv: string[], io: CliIO = defaultIO): Promise<number> {
  const program = createProgram(io);
  try {
    await program.parseAsync(argv, { from: "user" });
    return 0;
  } catch (err) {
    if (err instanceof CommanderError) {
      // commander already printed the message (or the help/version text)
      return err.exitCode;
    }
    if (isSchedulerError(err)) {
      io.err(`Error [${err.code}]: ${err.message}`);
      return 1;
    }
    io.err(`Error: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
}
