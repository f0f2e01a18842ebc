import { randomUUID } from "node:crypto";
import { CycleDetectedError, ValidationError } from "../errors.js";
import { routeRole } from "../routing/role-router.js";
import type { AgentRole, TaskGraph, TaskNode, TaskSpec } from "./types.js";

export type CreateGraphOptions = {
  /** Role for specs that omit one. Defaults to keyword routing on the description. */
  defaultRole?: (description: string) => AgentRole;
};

/**
 * Build a task graph from planner specs. Ids are assigned where missing and
 * the batch is validated before it is returned, so a cyclic or ill-formed
 * batch never reaches the executor.
 */
export function createTaskGraph(goal: string, specs: TaskSpec[], opts: CreateGraphOptions = {}): TaskGraph {
  const pickRole = opts.defaultRole ?? routeRole;
  const graph: TaskGraph = {
    id: randomUUID(),
    goal,
    nodes: specs.map((spec, i) => ({
      id: spec.id ?? `task-${i + 1}`,
      description: spec.description,
      role: spec.role ?? pickRole(spec.description),
      dependsOn: [...new Set(spec.dependsOn ?? [])],
      allowParallel: spec.allowParallel ?? true,
      status: "pending",
      ...(spec.retries !== undefined ? { retries: spec.retries } : {}),
    })),
  };
  validate(graph);
  return graph;
}

/** Check ids, roles and dependencies; reject cycles with the ids involved. */
export function validate(graph: TaskGraph): void {
  const ids = new Set<string>();
  for (const node of graph.nodes) {
    if (ids.has(node.id)) {
      throw new ValidationError("DUPLICATE_TASK", `Duplicate task id "${node.id}"`, { taskId: node.id });
    }
    ids.add(node.id);
    if (node.role === "orchestrator") {
      throw new ValidationError("INVALID_ROLE", `Task "${node.id}" is assigned to the orchestrator, which does not execute tasks`, {
        taskId: node.id,
      });
    }
  }

  for (const node of graph.nodes) {
    for (const dep of node.dependsOn) {
      if (dep === node.id) {
        throw new CycleDetectedError([node.id, node.id]);
      }
      if (!ids.has(dep)) {
        throw new ValidationError("UNKNOWN_DEPENDENCY", `Task "${node.id}" depends on unknown task "${dep}"`, {
          taskId: node.id,
          dependency: dep,
        });
      }
    }
  }

  const cycle = findCycle(graph);
  if (cycle) throw new CycleDetectedError(cycle);
}

function dependentsOf(graph: TaskGraph): Map<string, string[]> {
  const dependents = new Map<string, string[]>();
  for (const node of graph.nodes) {
    for (const dep of node.dependsOn) {
      const list = dependents.get(dep) ?? [];
      list.push(node.id);
      dependents.set(dep, list);
    }
  }
  return dependents;
}

/** DFS with coloring; returns the cycle path (first id repeated at the end) or null. */
function findCycle(graph: TaskGraph): string[] | null {
  const WHITE = 0, GRAY = 1, BLACK = 2;
  const color = new Map<string, number>();
  for (const node of graph.nodes) color.set(node.id, WHITE);
  const dependents = dependentsOf(graph);
  const path: string[] = [];

  function dfs(id: string): string[] | null {
    color.set(id, GRAY);
    path.push(id);
    for (const next of dependents.get(id) ?? []) {
      const c = color.get(next);
      if (c === GRAY) {
        // back edge: the cycle is the path from `next` to here
        return [...path.slice(path.indexOf(next)), next];
      }
      if (c === WHITE) {
        const found = dfs(next);
        if (found) return found;
      }
    }
    path.pop();
    color.set(id, BLACK);
    return null;
  }

  for (const node of graph.nodes) {
    if (color.get(node.id) === WHITE) {
      const found = dfs(node.id);
      if (found) return found;
    }
  }
  return null;
}

/** Return nodes in topological order (dependencies first). */
export function topologicalSort(graph: TaskGraph): TaskNode[] {
  const nodeMap = new Map(graph.nodes.map((n) => [n.id, n]));
  const visited = new Set<string>();
  const sorted: TaskNode[] = [];

  function visit(node: TaskNode): void {
    if (visited.has(node.id)) return;
    visited.add(node.id);
    for (const dep of node.dependsOn) {
      const depNode = nodeMap.get(dep);
      if (depNode) visit(depNode);
    }
    sorted.push(node);
  }

  for (const node of graph.nodes) visit(node);
  return sorted;
}

/** Pending, not blocked, and every dependency has succeeded. */
export function readyNodes(graph: TaskGraph): TaskNode[] {
  const succeeded = new Set(graph.nodes.filter((n) => n.status === "succeeded").map((n) => n.id));
  return graph.nodes.filter(
    (n) => n.status === "pending" && !n.blockedBy && n.dependsOn.every((d) => succeeded.has(d)),
  );
}

export function isTerminal(node: TaskNode): boolean {
  return node.status === "succeeded" || node.status === "failed" || node.status === "timed_out";
}

/** Nothing left to run: every node is terminal or blocked forever. */
export function isSettled(graph: TaskGraph): boolean {
  return graph.nodes.every((n) => isTerminal(n) || (n.status === "pending" && n.blockedBy !== undefined));
}

/**
 * Mark every pending transitive dependent of a failed node as blocked
 * forever. Returns the nodes that became blocked by this call.
 */
export function blockDownstream(graph: TaskGraph, failedNodeId: string): TaskNode[] {
  const dependents = dependentsOf(graph);
  const nodeMap = new Map(graph.nodes.map((n) => [n.id, n]));
  const queue = [...(dependents.get(failedNodeId) ?? [])];
  const visited = new Set<string>();
  const newlyBlocked: TaskNode[] = [];

  while (queue.length > 0) {
    const id = queue.shift();
    if (id === undefined || visited.has(id)) continue;
    visited.add(id);
    const node = nodeMap.get(id);
    if (!node || node.status !== "pending") continue;
    if (!node.blockedBy) {
      node.blockedBy = [failedNodeId];
      newlyBlocked.push(node);
    } else if (!node.blockedBy.includes(failedNodeId)) {
      node.blockedBy.push(failedNodeId);
    }
    queue.push(...(dependents.get(id) ?? []));
  }
  return newlyBlocked;
}

/** Ids, roles, statuses and dependencies: the part of a graph worth persisting or printing. */
export function graphSummary(graph: TaskGraph): Array<Pick<TaskNode, "id" | "role" | "status" | "dependsOn" | "blockedBy">> {
  return graph.nodes.map(({ id, role, status, dependsOn, blockedBy }) => ({
    id,
    role,
    status,
    dependsOn,
    ...(blockedBy ? { blockedBy } : {}),
  }));
}
