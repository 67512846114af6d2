import "./types";
import { decodeWith } from "../../graph/schemas";
import type { NodeModule } from "../../types/nodeModule";
import { mediaStreamSourceAudioFactory } from "./audio";
import { mediaStreamSourcePropsSchema } from "./types";

export const mediaStreamSourceNode: NodeModule<"mediaStreamSource"> = {
  kind: "mediaStreamSource",
  wireTag: "MediaStreamSource",
  decode: (raw) => decodeWith("mediaStreamSource", mediaStreamSourcePropsSchema, raw),
  audioFactory: mediaStreamSourceAudioFactory,
  shouldRecreate: (next, prev) => next.mediaStream !== prev.mediaStream,
};
