import { dedupeGraph } from "@graph/diff";
import { UnknownNodeKindError } from "@graph/errors";
import { getNodeModule, kindFromWireTag } from "@graph/nodeRegistry";
import { OutputSchema } from "@graph/schemas";
import type { AutomationMethod, Graph, GraphNode, Output, Param } from "@graph/types";
import { WireGraphSchema } from "./schemas";
import type { WireGraph, WireMethod, WireNode, WireOutput, WireParam, WireTarget } from "./schemas";

export type DecodeResult =
  | { success: true; graph: Graph }
  | { success: false; error: string };

/**
 * Decode a wire-format graph. Validation problems are reported in the result;
 * a `"node"` tag no module recognises throws `UnknownNodeKindError`.
 */
export function decodeGraph(json: unknown): DecodeResult {
  const envelope = WireGraphSchema.safeParse(json);
  if (!envelope.success) {
    return { success: false, error: `Invalid graph: ${envelope.error.message}` };
  }

  const graph: GraphNode[] = [];
  for (const [id, raw] of Object.entries(envelope.data)) {
    const kind = kindFromWireTag(raw.node);
    if (!kind) throw new UnknownNodeKindError(raw.node, id);

    const outputs = OutputSchema.safeParse(raw.output);
    if (!outputs.success) {
      return { success: false, error: `Invalid output of node "${id}": ${outputs.error.message}` };
    }

    const props = getNodeModule(kind).decode(raw);
    if (!props.success) {
      return { success: false, error: `Invalid node "${id}": ${props.error}` };
    }

    graph.push({ id, outputs: outputs.data, props: props.props });
  }

  return { success: true, graph };
}

function methodToWire(m: AutomationMethod): WireMethod {
  switch (m.type) {
    case "setValueAtTime":
      return [m.type, m.value, m.startTime];
    case "linearRampToValueAtTime":
      return [m.type, m.value, m.endTime];
    case "exponentialRampToValueAtTime":
      return [m.type, m.value, m.endTime];
    case "setTargetAtTime":
      return [m.type, m.target, m.startTime, m.timeConstant];
    case "setValueCurveAtTime":
      return [m.type, [...m.values], m.startTime, m.duration];
  }
}

export function paramToWire(param: Param): WireParam {
  return typeof param === "number" ? param : param.map(methodToWire);
}

function isAutomation(value: unknown): value is ReadonlyArray<AutomationMethod> {
  return (
    Array.isArray(value) &&
    value.length > 0 &&
    value.every((m: unknown) => typeof m === "object" && m !== null && "type" in m)
  );
}

/**
 * Canonical `"output"` encoding: omitted when empty, a bare target for a single
 * connection, an array otherwise.
 */
export function outputToWire(outputs: Output): WireOutput | undefined {
  const targets: WireTarget[] = outputs.map((c) =>
    c.destination === undefined ? c.key : { key: c.key, destination: c.destination },
  );
  if (targets.length === 0) return undefined;
  if (targets.length === 1) return targets[0];
  return targets;
}

/** Encode a graph to the wire format. Duplicate ids collapse to the last definition. */
export function encodeGraph(graph: Graph): WireGraph {
  const out: WireGraph = {};
  for (const node of dedupeGraph(graph)) {
    const wire: WireNode = { node: getNodeModule(node.props.kind).wireTag };
    const fields: Array<[string, unknown]> = Object.entries(node.props);
    for (const [key, value] of fields) {
      if (key === "kind" || value === undefined) continue;
      wire[key] = isAutomation(value) ? paramToWire(value) : value;
    }
    const output = outputToWire(node.outputs);
    if (output !== undefined) wire.output = output;
    out[node.id] = wire;
  }
  return out;
}
