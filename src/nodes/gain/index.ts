import "./types";
import { decodeWith } from "../../graph/schemas";
import type { NodeModule } from "../../types/nodeModule";
import { gainAudioFactory } from "./audio";
import { gainPropsSchema } from "./types";

export const gainNode: NodeModule<"gain"> = {
  kind: "gain",
  wireTag: "Gain",
  decode: (raw) => decodeWith("gain", gainPropsSchema, raw),
  audioFactory: gainAudioFactory,
};
