import type { NodeProps } from "../../graph/types";
import type { AudioContextLike, AudioNodeFactory, AudioNodeInstance } from "../../types/audioRuntime";
import { syncParam } from "../../utils/audio";

function createStereoPannerRuntime(
  ctx: AudioContextLike,
  props: NodeProps<"stereoPanner">,
): AudioNodeInstance<"stereoPanner"> {
  const panner = ctx.createStereoPanner();
  syncParam(panner.pan, props.pan, undefined);

  return {
    kind: "stereoPanner",
    input: panner,
    output: panner,
    getParam: (name) => (name === "pan" ? panner.pan : null),
    update: (next, prev) => {
      syncParam(panner.pan, next.pan, prev.pan);
    },
    onRemove: () => {
      panner.disconnect();
    },
  };
}

export const stereoPannerAudioFactory: AudioNodeFactory<"stereoPanner"> = {
  kind: "stereoPanner",
  create: (ctx, props) => createStereoPannerRuntime(ctx, props),
};
