import type { AudioNodeFactory } from "../../types/audioRuntime";

export const channelMergerAudioFactory: AudioNodeFactory<"channelMerger"> = {
  kind: "channelMerger",
  create: (ctx, props) => {
    const merger = ctx.createChannelMerger(props.numberOfInputs);
    return {
      kind: "channelMerger",
      input: merger,
      output: merger,
      getParam: () => null,
      // Channel count is fixed at construction.
      update: () => {},
      onRemove: () => {
        merger.disconnect();
      },
    };
  },
};
