import type { NodeProps } from "../../graph/types";
import type {
  AudioContextLike,
  AudioNodeFactory,
  AudioNodeInstance,
  BiquadFilterNodeLike,
} from "../../types/audioRuntime";
import { syncParam, syncValue } from "../../utils/audio";

type BiquadFilterProps = NodeProps<"biquadFilter">;

function sync(filter: BiquadFilterNodeLike, next: BiquadFilterProps, prev: BiquadFilterProps | null) {
  syncValue(next.type, prev?.type, (v) => (filter.type = v));
  syncParam(filter.frequency, next.frequency, prev?.frequency);
  syncParam(filter.detune, next.detune, prev?.detune);
  syncParam(filter.Q, next.Q, prev?.Q);
  syncParam(filter.gain, next.gain, prev?.gain);
}

function createBiquadFilterRuntime(
  ctx: AudioContextLike,
  props: BiquadFilterProps,
): AudioNodeInstance<"biquadFilter"> {
  const filter = ctx.createBiquadFilter();
  sync(filter, props, null);

  return {
    kind: "biquadFilter",
    input: filter,
    output: filter,
    getParam: (name) => {
      switch (name) {
        case "frequency":
          return filter.frequency;
        case "detune":
          return filter.detune;
        case "gain":
          return filter.gain;
        default:
          return null;
      }
    },
    update: (next, prev) => sync(filter, next, prev),
    onRemove: () => {
      filter.disconnect();
    },
  };
}

export const biquadFilterAudioFactory: AudioNodeFactory<"biquadFilter"> = {
  kind: "biquadFilter",
  create: (ctx, props) => createBiquadFilterRuntime(ctx, props),
};
