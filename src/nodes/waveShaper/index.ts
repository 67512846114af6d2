import "./types";
import { decodeWith } from "../../graph/schemas";
import type { NodeModule } from "../../types/nodeModule";
import { waveShaperAudioFactory } from "./audio";
import { waveShaperPropsSchema } from "./types";

export const waveShaperNode: NodeModule<"waveShaper"> = {
  kind: "waveShaper",
  wireTag: "WaveShaper",
  decode: (raw) => decodeWith("waveShaper", waveShaperPropsSchema, raw),
  audioFactory: waveShaperAudioFactory,
};
