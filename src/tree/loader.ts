import { readFile } from "node:fs/promises";
import { getConfig } from "../config.js";
import { InvalidConfigurationError, ParseError } from "../errors.js";
import { createLogger } from "../utils/logger.js";
import { TreeBuilder } from "./task-tree.js";
import type { LoadedTree } from "./types.js";

const log = createLogger("loader");

const EDGE_MARKER = "->";
const DIRECTIVE_MARKER = "#";
const PROCS_DIRECTIVE = /#\s*procs\s*=\s*([^\s#]*)/i;
const INTEGER = /^-?\d+$/;

export type LoadOptions = {
  /** Label stored on the result; defaults to "<inline>" for text input */
  source?: string;
  /** Overrides `loader.defaultProcessors` from the config */
  defaultProcessors?: number;
};

function parseDirective(text: string, line: number): number {
  const match = PROCS_DIRECTIVE.exec(text);
  if (!match) {
    throw new ParseError(`processor directive must look like "# procs=N", got "${text}"`, { line, token: text });
  }
  const raw = match[1];
  if (!INTEGER.test(raw)) {
    throw new ParseError(`processor count "${raw}" is not an integer`, { line, token: raw });
  }
  const count = Number.parseInt(raw, 10);
  if (count < 1) {
    throw new InvalidConfigurationError(`line ${line}: processor count must be at least 1, got ${count}`);
  }
  return count;
}

function parseEdge(text: string, line: number): [string, string] {
  const parts = text.split(EDGE_MARKER).map((p) => p.trim());
  if (parts.length !== 2 || parts[0] === "" || parts[1] === "") {
    throw new ParseError(`expected "Parent_D -> Child_D", got "${text}"`, { line, token: text });
  }
  return [parts[0], parts[1]];
}

/**
 * Build a task tree from edge-list text. Lines with `#` set the processor
 * count (last one wins), lines with `->` add an edge, anything else is skipped.
 */
export function parseTree(text: string, opts?: LoadOptions): LoadedTree {
  const source = opts?.source ?? "<inline>";
  let processorCount = opts?.defaultProcessors ?? getConfig().loader.defaultProcessors;
  if (!Number.isInteger(processorCount) || processorCount < 1) {
    throw new InvalidConfigurationError(`default processor count must be a positive integer, got ${processorCount}`);
  }

  const builder = new TreeBuilder();
  let edges = 0;

  text.split(/\r?\n/).forEach((rawLine, index) => {
    const line = index + 1;
    const trimmed = rawLine.trim();
    if (trimmed.includes(DIRECTIVE_MARKER)) {
      processorCount = parseDirective(trimmed, line);
    } else if (trimmed.includes(EDGE_MARKER)) {
      const [parent, child] = parseEdge(trimmed, line);
      builder.link(parent, child, line);
      edges++;
    }
  });

  const tree = builder.build();
  log.debug("Task tree loaded", { source, tasks: tree.nodes.length, edges, processorCount });
  return { tree, processorCount, source };
}

/** Read an edge-list file and build its task tree. */
export async function loadTreeFile(path: string, opts?: Omit<LoadOptions, "source">): Promise<LoadedTree> {
  const text = await readFile(path, { encoding: getConfig().loader.encoding });
  return parseTree(text, { ...opts, source: path });
}
