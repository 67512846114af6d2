import type { AudioNodeFactory } from "../../types/audioRuntime";

export const mediaStreamDestinationAudioFactory: AudioNodeFactory<"mediaStreamDestination"> = {
  kind: "mediaStreamDestination",
  create: (ctx) => {
    const sink = ctx.createMediaStreamDestination();
    return {
      kind: "mediaStreamDestination",
      input: sink,
      output: null,
      getParam: () => null,
      update: () => {},
      onRemove: () => {
        sink.disconnect();
      },
    };
  },
};
