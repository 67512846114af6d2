import "./types";
import { decodeWith } from "../../graph/schemas";
import type { NodeModule } from "../../types/nodeModule";
import { analyserAudioFactory } from "./audio";
import { analyserPropsSchema } from "./types";

export const analyserNode: NodeModule<"analyser"> = {
  kind: "analyser",
  wireTag: "Analyser",
  decode: (raw) => decodeWith("analyser", analyserPropsSchema, raw),
  audioFactory: analyserAudioFactory,
};
