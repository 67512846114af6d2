import type { NodeProps } from "../../graph/types";
import type { AudioContextLike, AudioNodeFactory, AudioNodeInstance } from "../../types/audioRuntime";
import { syncParam } from "../../utils/audio";

function createGainRuntime(ctx: AudioContextLike, props: NodeProps<"gain">): AudioNodeInstance<"gain"> {
  const gain = ctx.createGain();
  syncParam(gain.gain, props.gain, undefined);

  return {
    kind: "gain",
    input: gain,
    output: gain,
    getParam: (name) => (name === "gain" ? gain.gain : null),
    update: (next, prev) => {
      syncParam(gain.gain, next.gain, prev.gain);
    },
    onRemove: () => {
      gain.disconnect();
    },
  };
}

export const gainAudioFactory: AudioNodeFactory<"gain"> = {
  kind: "gain",
  create: (ctx, props) => createGainRuntime(ctx, props),
};
