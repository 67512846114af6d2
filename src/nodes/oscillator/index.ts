import "./types";
import { decodeWith } from "../../graph/schemas";
import type { NodeModule } from "../../types/nodeModule";
import { oscillatorAudioFactory } from "./audio";
import { oscillatorPropsSchema } from "./types";

export const oscillatorNode: NodeModule<"oscillator"> = {
  kind: "oscillator",
  wireTag: "Oscillator",
  decode: (raw) => decodeWith("oscillator", oscillatorPropsSchema, raw),
  audioFactory: oscillatorAudioFactory,
  // A source node starts once; new start or stop times need a fresh node.
  shouldRecreate: (next, prev) =>
    next.startTime !== prev.startTime || next.stopTime !== prev.stopTime,
};
