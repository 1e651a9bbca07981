/** Index of a task in its tree's node arena. */
export type TaskId = number;

export type TaskNode = {
  id: TaskId;
  name: string;
  /** Simulated time units; fixed once the node is created */
  duration: number;
  /** Raw `Name_Duration` token the node was created from */
  token: string;
  parent: TaskId | null;
  children: TaskId[];
};

export type TaskTree = {
  nodes: readonly TaskNode[];
  root: TaskId;
};

export type LoadedTree = {
  tree: TaskTree;
  processorCount: number;
  /** File path or other label identifying where the edges came from */
  source: string;
};
