import type { AudioNodeFactory } from "../../types/audioRuntime";

export const mediaElementSourceAudioFactory: AudioNodeFactory<"mediaElementSource"> = {
  kind: "mediaElementSource",
  create: (ctx, props, services) => {
    const element = services.resolveMediaElement(props.mediaElement);
    if (!element) throw new Error(`Media element not found: ${props.mediaElement}`);
    const source = ctx.createMediaElementSource(element);
    return {
      kind: "mediaElementSource",
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
