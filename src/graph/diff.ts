import { nodesEqual } from "./equality";
import type { Graph, GraphNode, GraphOperation, NodeId } from "./types";

/** Index a graph by id. A later duplicate id replaces the earlier definition. */
export function indexGraph(graph: Graph): Map<NodeId, GraphNode> {
  const out = new Map<NodeId, GraphNode>();
  for (const node of graph) out.set(node.id, node);
  return out;
}

/** Collapse duplicate ids, keeping the last definition at the position of the first. */
export function dedupeGraph(graph: Graph): Graph {
  return [...indexGraph(graph).values()];
}

/**
 * Compute the operations that turn `previous` into `next`.
 *
 * Upserts come first, in `next` order, for ids that are new or whose props or
 * outputs changed. Removes follow, in `previous` order. Unchanged ids produce
 * nothing. Connection targets are not inspected: forward references are legal.
 */
export function diff(previous: Graph, next: Graph): GraphOperation[] {
  const prev = indexGraph(previous);
  const nextById = indexGraph(next);
  const ops: GraphOperation[] = [];

  for (const [id, node] of nextById) {
    const old = prev.get(id);
    if (!old || !nodesEqual(old, node)) ops.push({ type: "upsert", id, node });
  }

  for (const id of prev.keys()) {
    if (!nextById.has(id)) ops.push({ type: "remove", id });
  }

  return ops;
}
