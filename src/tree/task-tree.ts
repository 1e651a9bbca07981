import { MalformedTreeError, ParseError } from "../errors.js";
import type { TaskId, TaskNode, TaskTree } from "./types.js";

const DURATION_PATTERN = /^\d+$/;

/**
 * Split a `Name_Duration` token. The first `_` separates the name from the
 * duration, so `A_B_5` is rejected rather than read as name `A_B`.
 */
export function parseTaskToken(raw: string, line?: number): { name: string; duration: number } {
  const sep = raw.indexOf("_");
  if (sep === -1) {
    throw new ParseError(`expected Name_Duration, got "${raw}"`, { line, token: raw });
  }
  const name = raw.slice(0, sep);
  const digits = raw.slice(sep + 1);
  if (name.length === 0) {
    throw new ParseError(`missing task name in "${raw}"`, { line, token: raw });
  }
  if (!DURATION_PATTERN.test(digits)) {
    throw new ParseError(`invalid duration "${digits}" in "${raw}"`, { line, token: raw });
  }
  const duration = Number.parseInt(digits, 10);
  if (!Number.isSafeInteger(duration)) {
    throw new ParseError(`duration out of range in "${raw}"`, { line, token: raw });
  }
  return { name, duration };
}

/**
 * Accumulates tasks and parent → child links keyed by their raw token, then
 * resolves the single root. One builder produces one tree.
 */
export class TreeBuilder {
  private nodes: TaskNode[] = [];
  private byToken = new Map<string, TaskId>();

  /** Intern a task token, creating its node on first sight. */
  addTask(token: string, line?: number): TaskId {
    const existing = this.byToken.get(token);
    if (existing !== undefined) return existing;

    const { name, duration } = parseTaskToken(token, line);
    const id = this.nodes.length;
    this.nodes.push({ id, name, duration, token, parent: null, children: [] });
    this.byToken.set(token, id);
    return id;
  }

  link(parentToken: string, childToken: string, line?: number): void {
    if (parentToken === childToken) {
      throw new MalformedTreeError(`task "${parentToken}" depends on itself`, { line, token: childToken });
    }
    const parentId = this.addTask(parentToken, line);
    const childId = this.addTask(childToken, line);
    const child = this.nodes[childId];

    if (child.parent !== null) {
      const current = this.nodes[child.parent];
      throw new MalformedTreeError(
        `task "${childToken}" already depends on "${current.token}"; a task has at most one parent`,
        { line, token: childToken },
      );
    }

    child.parent = parentId;
    this.nodes[parentId].children.push(childId);
  }

  get size(): number {
    return this.nodes.length;
  }

  /** Resolve the root and validate the result. */
  build(): TaskTree {
    if (this.nodes.length === 0) {
      throw new MalformedTreeError("no tasks defined");
    }
    const roots = this.nodes.filter((n) => n.parent === null);
    if (roots.length === 0) {
      throw new MalformedTreeError("no root task: every task has a parent, the edges form a cycle");
    }
    if (roots.length > 1) {
      const tokens = roots.map((n) => n.token).join(", ");
      throw new MalformedTreeError(`ambiguous root: ${roots.length} tasks have no parent (${tokens})`);
    }

    const tree: TaskTree = { nodes: this.nodes, root: roots[0].id };
    validateTree(tree);
    return tree;
  }
}

export function getTask(tree: TaskTree, id: TaskId): TaskNode {
  const node = tree.nodes[id];
  if (node === undefined) {
    throw new MalformedTreeError(`unknown task id ${id}`);
  }
  return node;
}

/** Pre-order walk from the root using an explicit stack. */
export function* traverse(tree: TaskTree): Generator<TaskNode> {
  const stack: TaskId[] = [tree.root];
  while (stack.length > 0) {
    const id = stack.pop();
    if (id === undefined) break;
    const node = getTask(tree, id);
    yield node;
    for (let i = node.children.length - 1; i >= 0; i--) {
      stack.push(node.children[i]);
    }
  }
}

/** Pre-order walk that also yields each task's depth below the root. */
export function* traverseWithDepth(tree: TaskTree): Generator<{ node: TaskNode; depth: number }> {
  const stack: Array<{ id: TaskId; depth: number }> = [{ id: tree.root, depth: 0 }];
  while (stack.length > 0) {
    const entry = stack.pop();
    if (entry === undefined) break;
    const node = getTask(tree, entry.id);
    yield { node, depth: entry.depth };
    for (let i = node.children.length - 1; i >= 0; i--) {
      stack.push({ id: node.children[i], depth: entry.depth + 1 });
    }
  }
}

export function collectTasks(tree: TaskTree): TaskNode[] {
  return [...traverse(tree)];
}

/**
 * Check the out-tree invariants: a parentless root, every task reached exactly
 * once from it, parent indices that agree with the children lists, and
 * non-negative integer durations.
 */
export function validateTree(tree: TaskTree): void {
  const { nodes } = tree;
  if (nodes.length === 0) {
    throw new MalformedTreeError("tree has no tasks");
  }
  nodes.forEach((node, index) => {
    if (node.id !== index) {
      throw new MalformedTreeError(`task "${node.token}" is stored at index ${index} but has id ${node.id}`);
    }
    if (!Number.isSafeInteger(node.duration) || node.duration < 0) {
      throw new MalformedTreeError(
        `task "${node.token}" has duration ${node.duration}; durations are non-negative integers`,
      );
    }
  });

  const root = getTask(tree, tree.root);
  if (root.parent !== null) {
    throw new MalformedTreeError(`root task "${root.token}" has a parent`);
  }

  const visited = new Set<TaskId>([root.id]);
  const stack: TaskId[] = [root.id];
  while (stack.length > 0) {
    const id = stack.pop();
    if (id === undefined) break;
    const node = getTask(tree, id);
    for (const childId of node.children) {
      const child = getTask(tree, childId);
      if (visited.has(childId)) {
        throw new MalformedTreeError(`task "${child.token}" is reachable by more than one path`);
      }
      if (child.parent !== node.id) {
        throw new MalformedTreeError(`task "${child.token}" is listed under "${node.token}" but its parent differs`);
      }
      visited.add(childId);
      stack.push(childId);
    }
  }

  if (visited.size !== nodes.length) {
    const unreachable = nodes.filter((n) => !visited.has(n.id)).map((n) => n.token);
    throw new MalformedTreeError(
      `tasks unreachable from root "${root.token}": ${unreachable.join(", ")} (cycle or detached edges)`,
    );
  }
}

/** Number of edges between the root and the task. */
export function depthOf(tree: TaskTree, id: TaskId): number {
  let depth = 0;
  let node = getTask(tree, id);
  while (node.parent !== null) {
    depth++;
    if (depth > tree.nodes.length) {
      throw new MalformedTreeError(`task "${node.token}" has a cyclic parent chain`);
    }
    node = getTask(tree, node.parent);
  }
  return depth;
}
