import "./types";
import { decodeWith } from "../../graph/schemas";
import type { NodeModule } from "../../types/nodeModule";
import { delayAudioFactory } from "./audio";
import { delayPropsSchema } from "./types";

export const delayNode: NodeModule<"delay"> = {
  kind: "delay",
  wireTag: "Delay",
  decode: (raw) => decodeWith("delay", delayPropsSchema, raw),
  audioFactory: delayAudioFactory,
  shouldRecreate: (next, prev) => next.maxDelayTime !== prev.maxDelayTime,
};
