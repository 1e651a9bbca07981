import { homedir } from "node:os";
import { join } from "node:path";
import type { LogLevel } from "./utils/logger.js";

export type SchedulerConfig = {
  loader: {
    /** Processor count used when the source carries no `# procs=N` directive */
    defaultProcessors: number;
    encoding: BufferEncoding;
  };
  report: {
    /** Decimal places kept for ratios in reports */
    decimals: number;
  };
  store: {
    path: string;
    historyLimit: number;
  };
  log: {
    level: LogLevel;
  };
};

export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> : T[P];
};

const DEFAULTS: SchedulerConfig = {
  loader: {
    defaultProcessors: 1,
    encoding: "utf8",
  },
  report: {
    decimals: 2,
  },
  store: {
    path: join(homedir(), ".task-tree-scheduler", "reports.db"),
    historyLimit: 20,
  },
  log: {
    level: "info",
  },
};

let current: SchedulerConfig = structuredClone(DEFAULTS);

/** Override config values. Each section is merged with its defaults. */
export function configure(overrides: DeepPartial<SchedulerConfig>): void {
  current = {
    loader: { ...DEFAULTS.loader, ...overrides.loader },
    report: { ...DEFAULTS.report, ...overrides.report },
    store: { ...DEFAULTS.store, ...overrides.store },
    log: { ...DEFAULTS.log, ...overrides.log },
  };
}

/** Reset config to defaults. */
export function resetConfig(): void {
  current = structuredClone(DEFAULTS);
}

/** Get the current config (read-only). */
export function getConfig(): Readonly<SchedulerConfig> {
  return current;
}

/** The default config values (frozen). */
export const defaults: Readonly<SchedulerConfig> = Object.freeze(structuredClone(DEFAULTS));
