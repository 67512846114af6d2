import "./types";
import { decodeWith } from "../../graph/schemas";
import type { NodeModule } from "../../types/nodeModule";
import { channelMergerAudioFactory } from "./audio";
import { channelMergerPropsSchema } from "./types";

export const channelMergerNode: NodeModule<"channelMerger"> = {
  kind: "channelMerger",
  wireTag: "ChannelMerger",
  decode: (raw) => decodeWith("channelMerger", channelMergerPropsSchema, raw),
  audioFactory: channelMergerAudioFactory,
  shouldRecreate: (next, prev) => next.numberOfInputs !== prev.numberOfInputs,
};
