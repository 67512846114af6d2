import "./types";
import { decodeWith } from "../../graph/schemas";
import type { NodeModule } from "../../types/nodeModule";
import { biquadFilterAudioFactory } from "./audio";
import { biquadFilterPropsSchema } from "./types";

export const biquadFilterNode: NodeModule<"biquadFilter"> = {
  kind: "biquadFilter",
  wireTag: "BiquadFilter",
  decode: (raw) => decodeWith("biquadFilter", biquadFilterPropsSchema, raw),
  audioFactory: biquadFilterAudioFactory,
};
