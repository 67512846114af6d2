import "./types";
import { decodeWith } from "../../graph/schemas";
import type { NodeModule } from "../../types/nodeModule";
import { pannerAudioFactory } from "./audio";
import { pannerPropsSchema } from "./types";

export const pannerNode: NodeModule<"panner"> = {
  kind: "panner",
  wireTag: "Panner",
  decode: (raw) => decodeWith("panner", pannerPropsSchema, raw),
  audioFactory: pannerAudioFactory,
};
