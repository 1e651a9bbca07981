import { getTask, traverse, traverseWithDepth } from "./task-tree.js";
import type { TaskTree } from "./types.js";

/** Indented outline, one task per line: `- B (duration=3, parent=A)`. */
export function formatTreeOutline(tree: TaskTree): string {
  const lines: string[] = [];
  for (const { node, depth } of traverseWithDepth(tree)) {
    const parent = node.parent === null ? "none" : getTask(tree, node.parent).name;
    const indent = "  ".repeat(depth);
    lines.push(`${indent}- ${node.name} (duration=${node.duration}, parent=${parent})`);
  }
  return lines.join("\n");
}

function quote(text: string): string {
  return `"${text.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}

/** Graphviz DOT source for the tree; render with `dot -Tpng`. */
export function toDot(tree: TaskTree, title = "tasks"): string {
  const lines = [`digraph ${quote(title)} {`, "  rankdir=TB;", "  node [shape=box];"];
  for (const node of traverse(tree)) {
    lines.push(`  t${node.id} [label=${quote(`${node.name} (${node.duration})`)}];`);
  }
  for (const node of traverse(tree)) {
    for (const childId of node.children) {
      lines.push(`  t${node.id} -> t${childId};`);
    }
  }
  lines.push("}");
  return lines.join("\n");
}
