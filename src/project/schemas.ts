import { z } from "zod";
import type { NodeId, ParamDestination } from "@graph/types";

/**
 * Outer shape of a wire graph: an object keyed by node id whose values carry a
 * `"node"` kind tag. Kind fields and `"output"` are validated per node.
 */
export const WireGraphSchema = z.record(
  z.string(),
  z
    .object({
      node: z.string(),
      output: z.unknown().optional(),
    })
    .passthrough(),
);

export type WireMethod =
  | ["setValueAtTime", number, number]
  | ["linearRampToValueAtTime", number, number]
  | ["exponentialRampToValueAtTime", number, number]
  | ["setTargetAtTime", number, number, number]
  | ["setValueCurveAtTime", number[], number, number];

export type WireParam = number | WireMethod[];

export type WireConnection = { key: NodeId; destination?: ParamDestination };

export type WireTarget = NodeId | WireConnection;

export type WireOutput = WireTarget | WireTarget[];

export type WireNode = {
  node: string;
  output?: WireOutput;
  [field: string]: unknown;
};

export type WireGraph = Record<NodeId, WireNode>;
