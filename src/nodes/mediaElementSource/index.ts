import "./types";
import { decodeWith } from "../../graph/schemas";
import type { NodeModule } from "../../types/nodeModule";
import { mediaElementSourceAudioFactory } from "./audio";
import { mediaElementSourcePropsSchema } from "./types";

export const mediaElementSourceNode: NodeModule<"mediaElementSource"> = {
  kind: "mediaElementSource",
  wireTag: "MediaElementSource",
  decode: (raw) => decodeWith("mediaElementSource", mediaElementSourcePropsSchema, raw),
  audioFactory: mediaElementSourceAudioFactory,
  shouldRecreate: (next, prev) => next.mediaElement !== prev.mediaElement,
};
