import type { NodeModule } from "@/types/nodeModule";
import { NODE_MODULES } from "@nodes";
import type { NodeKind } from "./types";

const KIND_BY_WIRE_TAG = new Map<string, NodeKind>(
  Object.values(NODE_MODULES).map((mod) => [mod.wireTag, mod.kind] as const),
);

export function isNodeKind(kind: string): kind is NodeKind {
  return Object.prototype.hasOwnProperty.call(NODE_MODULES, kind);
}

export function getNodeModule<K extends NodeKind>(kind: K): NodeModule<K> {
  return NODE_MODULES[kind];
}

/** Kind for a wire tag such as `"StereoPanner"`, or null when no module claims it. */
export function kindFromWireTag(tag: string): NodeKind | null {
  return KIND_BY_WIRE_TAG.get(tag) ?? null;
}

export function listNodeKinds(): ReadonlyArray<NodeKind> {
  return Object.values(NODE_MODULES).map((mod) => mod.kind);
}
