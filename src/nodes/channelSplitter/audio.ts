import type { AudioNodeFactory } from "../../types/audioRuntime";

export const channelSplitterAudioFactory: AudioNodeFactory<"channelSplitter"> = {
  kind: "channelSplitter",
  create: (ctx, props) => {
    const splitter = ctx.createChannelSplitter(props.numberOfOutputs);
    return {
      kind: "channelSplitter",
      input: splitter,
      output: splitter,
      getParam: () => null,
      update: () => {},
      onRemove: () => {
        splitter.disconnect();
      },
    };
  },
};
