import type { NodeProps } from "../../graph/types";
import type {
  AudioContextLike,
  AudioNodeFactory,
  AudioNodeInstance,
  WaveShaperNodeLike,
} from "../../types/audioRuntime";
import { syncValue } from "../../utils/audio";

type WaveShaperProps = NodeProps<"waveShaper">;

function sync(shaper: WaveShaperNodeLike, next: WaveShaperProps, prev: WaveShaperProps | null) {
  syncValue(next.curve, prev?.curve, (v) => (shaper.curve = Float32Array.from(v)));
  syncValue(next.oversample, prev?.oversample, (v) => (shaper.oversample = v));
}

function createWaveShaperRuntime(
  ctx: AudioContextLike,
  props: WaveShaperProps,
): AudioNodeInstance<"waveShaper"> {
  const shaper = ctx.createWaveShaper();
  sync(shaper, props, null);

  return {
    kind: "waveShaper",
    input: shaper,
    output: shaper,
    getParam: () => null,
    update: (next, prev) => sync(shaper, next, prev),
    onRemove: () => {
      shaper.disconnect();
    },
  };
}

export const waveShaperAudioFactory: AudioNodeFactory<"waveShaper"> = {
  kind: "waveShaper",
  create: (ctx, props) => createWaveShaperRuntime(ctx, props),
};
