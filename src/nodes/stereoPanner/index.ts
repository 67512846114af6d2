import "./types";
import { decodeWith } from "../../graph/schemas";
import type { NodeModule } from "../../types/nodeModule";
import { stereoPannerAudioFactory } from "./audio";
import { stereoPannerPropsSchema } from "./types";

export const stereoPannerNode: NodeModule<"stereoPanner"> = {
  kind: "stereoPanner",
  wireTag: "StereoPanner",
  decode: (raw) => decodeWith("stereoPanner", stereoPannerPropsSchema, raw),
  audioFactory: stereoPannerAudioFactory,
};
