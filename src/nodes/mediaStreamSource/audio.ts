import type { AudioNodeFactory } from "../../types/audioRuntime";

export const mediaStreamSourceAudioFactory: AudioNodeFactory<"mediaStreamSource"> = {
  kind: "mediaStreamSource",
  create: (ctx, props, services) => {
    const stream = services.resolveMediaStream(props.mediaStream);
    if (!stream) throw new Error(`Media stream not found: ${props.mediaStream}`);
    const source = ctx.createMediaStreamSource(stream);
    return {
      kind: "mediaStreamSource",
      input: null,
      output: source,
      getParam: () => null,
      update: () => {},
      onRemove: () => {
        source.disconnect();
      },
    };
  },
};
