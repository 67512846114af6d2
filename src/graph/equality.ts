import type { GraphNode } from "./types";

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function definedKeys(o: Record<string, unknown>): string[] {
  return Object.keys(o).filter((k) => o[k] !== undefined);
}

/**
 * Structural equality over plain data: primitives (compared with `Object.is`),
 * arrays and plain records. A key holding `undefined` counts as absent.
 */
export function deepEqual(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) return true;

  if (Array.isArray(a)) {
    if (!Array.isArray(b) || a.length !== b.length) return false;
    for (let i = 0; i < a.length; i++) {
      if (!deepEqual(a[i], b[i])) return false;
    }
    return true;
  }

  if (isRecord(a)) {
    if (!isRecord(b)) return false;
    const ak = definedKeys(a);
    const bk = definedKeys(b);
    if (ak.length !== bk.length) return false;
    for (const k of ak) {
      if (!deepEqual(a[k], b[k])) return false;
    }
    return true;
  }

  return false;
}

/** Two definitions are equal when their props and outputs are. Ids are not compared. */
export function nodesEqual(a: GraphNode, b: GraphNode): boolean {
  return deepEqual(a.props, b.props) && deepEqual(a.outputs, b.outputs);
}
