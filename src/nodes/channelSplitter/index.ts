import "./types";
import { decodeWith } from "../../graph/schemas";
import type { NodeModule } from "../../types/nodeModule";
import { channelSplitterAudioFactory } from "./audio";
import { channelSplitterPropsSchema } from "./types";

export const channelSplitterNode: NodeModule<"channelSplitter"> = {
  kind: "channelSplitter",
  wireTag: "ChannelSplitter",
  decode: (raw) => decodeWith("channelSplitter", channelSplitterPropsSchema, raw),
  audioFactory: channelSplitterAudioFactory,
  shouldRecreate: (next, prev) => next.numberOfOutputs !== prev.numberOfOutputs,
};
