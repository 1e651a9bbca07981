import { describe, expect, it } from "vitest";
import { InvalidConfigurationError, MalformedTreeError } from "../src/errors.js";
import { schedule } from "../src/scheduler/engine.js";
import type { Policy } from "../src/scheduler/types.js";
import { parseTree } from "../src/tree/loader.js";
import { collectTasks, TreeBuilder } from "../src/tree/task-tree.js";
import type { TaskTree } from "../src/tree/types.js";

function tree(text: string): TaskTree {
  return parseTree(text).tree;
}

const WIDE = `
R_2 -> A_4
R_2 -> B_1
R_2 -> C_3
A_4 -> D_2
B_1 -> E_5
B_1 -> F_1
C_3 -> G_2
E_5 -> H_1
`;

describe("schedule", () => {
  it("runs children in parallel once the root finishes", () => {
    const result = schedule(tree("A_5 -> B_3\nA_5 -> C_2"), 2, "ascending");
    expect(result.totalTime).toBe(8);
    expect(result.order).toEqual(["A", "C", "B"]);
  });

  it("runs a chain on one processor in sequence under both policies", () => {
    const chain = tree("A_2 -> B_2\nB_2 -> C_2");
    for (const policy of ["ascending", "descending"] satisfies Policy[]) {
      const result = schedule(chain, 1, policy);
      expect(result.totalTime).toBe(6);
      expect(result.order).toEqual(["A", "B", "C"]);
    }
  });

  it("takes the longest ready task first under the descending policy", () => {
    const result = schedule(tree("R_0 -> A_1\nR_0 -> B_1\nR_0 -> C_2"), 2, "descending");
    expect(result.totalTime).toBe(2);
    expect(result.order).toEqual(["R", "A", "C", "B"]);
  });

  it("takes the shortest ready task first under the ascending policy", () => {
    const result = schedule(tree("R_0 -> A_1\nR_0 -> B_1\nR_0 -> C_2"), 2, "ascending");
    expect(result.totalTime).toBe(3);
    expect(result.order).toEqual(["R", "A", "B", "C"]);
  });

  it("keeps arrival order among tasks of equal duration", () => {
    const result = schedule(tree("R_1 -> X_2\nR_1 -> Y_2\nR_1 -> Z_2"), 1, "descending");
    expect(result.order).toEqual(["R", "X", "Y", "Z"]);
  });

  it("releases children in the order their parents were admitted", () => {
    // P and Q finish together; P was admitted first, so its child is queued first
    const result = schedule(tree("R_0 -> P_1\nR_0 -> Q_1\nQ_1 -> Qc_1\nP_1 -> Pc_1"), 2, "ascending");
    expect(result.order).toEqual(["R", "P", "Q", "Pc", "Qc"]);
  });

  it("completes zero-duration tasks in the same time step", () => {
    const result = schedule(tree("A_0 -> B_0\nA_0 -> C_3"), 2, "ascending");
    expect(result.totalTime).toBe(3);
    expect(result.order).toEqual(["A", "B", "C"]);
  });

  it("schedules a single-task tree", () => {
    const builder = new TreeBuilder();
    builder.addTask("Solo_7");
    const result = schedule(builder.build(), 3, "ascending");
    expect(result.totalTime).toBe(7);
    expect(result.order).toEqual(["Solo"]);
  });

  it("records a timeline entry per task on the lowest free processor", () => {
    const result = schedule(tree("A_5 -> B_3\nA_5 -> C_2"), 2, "ascending");
    expect(result.timeline).toEqual([
      { task: "A", processor: 0, start: 0, end: 5 },
      { task: "C", processor: 0, start: 5, end: 7 },
      { task: "B", processor: 1, start: 5, end: 8 },
    ]);
  });

  it("reports the policy and processor count it ran with", () => {
    const result = schedule(tree("A_1 -> B_1"), 3, "descending");
    expect(result.policy).toBe("descending");
    expect(result.processorCount).toBe(3);
  });

  it("calls the start and end hooks", () => {
    const events: string[] = [];
    schedule(tree("A_5 -> B_3\nA_5 -> C_2"), 2, "ascending", {
      onTaskStart: (task, time, processor) => events.push(`start ${task.name}@${time} p${processor}`),
      onTaskEnd: (task, time) => events.push(`end ${task.name}@${time}`),
    });
    expect(events).toEqual([
      "start A@0 p0",
      "end A@5",
      "start C@5 p0",
      "start B@5 p1",
      "end C@7",
      "end B@8",
    ]);
  });

  it("rejects a processor count below one", () => {
    expect(() => schedule(tree("A_1 -> B_1"), 0, "ascending")).toThrow(InvalidConfigurationError);
    expect(() => schedule(tree("A_1 -> B_1"), 1.5, "ascending")).toThrow(
      "processor count must be a positive integer, got 1.5",
    );
  });

  it("rejects a negative duration before simulating", () => {
    const negative: TaskTree = {
      root: 0,
      nodes: [{ id: 0, name: "A", duration: -4, token: "A_-4", parent: null, children: [] }],
    };
    expect(() => schedule(negative, 1, "ascending")).toThrow(MalformedTreeError);
  });

  it("rejects a tree with a task reachable twice", () => {
    const shared: TaskTree = {
      root: 0,
      nodes: [
        { id: 0, name: "A", duration: 1, token: "A_1", parent: null, children: [1, 1] },
        { id: 1, name: "B", duration: 1, token: "B_1", parent: 0, children: [] },
      ],
    };
    expect(() => schedule(shared, 2, "ascending")).toThrow(MalformedTreeError);
  });
});

describe("schedule properties", () => {
  const wide = tree(WIDE);
  const tasks = collectTasks(wide);
  const durations = tasks.map((t) => t.duration);
  const sum = durations.reduce((a, b) => a + b, 0);

  for (const policy of ["ascending", "descending"] satisfies Policy[]) {
    for (const procs of [1, 2, 3, 8]) {
      describe(`${policy} on ${procs} processor(s)`, () => {
        const result = schedule(wide, procs, policy);

        it("completes every task exactly once, after its parent", () => {
          expect([...result.order].sort()).toEqual(tasks.map((t) => t.name).sort());
          for (const task of tasks) {
            if (task.parent === null) continue;
            const parent = wide.nodes[task.parent];
            expect(result.order.indexOf(task.name)).toBeGreaterThan(result.order.indexOf(parent.name));
          }
        });

        it("never runs more tasks than processors", () => {
          let running = 0;
          let peak = 0;
          schedule(wide, procs, policy, {
            onTaskStart: () => {
              running++;
              peak = Math.max(peak, running);
            },
            onTaskEnd: () => {
              running--;
            },
          });
          expect(peak).toBeLessThanOrEqual(procs);
        });

        it("respects the makespan lower bounds", () => {
          expect(result.totalTime).toBeGreaterThanOrEqual(Math.max(...durations));
          expect(result.totalTime).toBeGreaterThanOrEqual(Math.ceil(sum / procs));
        });

        it("is deterministic", () => {
          const again = schedule(wide, procs, policy);
          expect(again.totalTime).toBe(result.totalTime);
          expect(again.order).toEqual(result.order);
        });

        it("ends at the latest timeline entry", () => {
          expect(result.totalTime).toBe(Math.max(...result.timeline.map((e) => e.end)));
        });
      });
    }
  }

  it("takes the sum of durations on a single processor", () => {
    expect(schedule(wide, 1, "ascending").totalTime).toBe(sum);
    expect(schedule(wide, 1, "descending").totalTime).toBe(sum);
  });

  it("does not mutate the tree", () => {
    const before = JSON.stringify(wide);
    schedule(wide, 2, "ascending");
    schedule(wide, 2, "descending");
    expect(JSON.stringify(wide)).toBe(before);
  });
});
