import type { NodeProps } from "../../graph/types";
import type {
  AudioContextLike,
  AudioNodeFactory,
  AudioNodeInstance,
  DynamicsCompressorNodeLike,
} from "../../types/audioRuntime";
import { syncParam } from "../../utils/audio";

type DynamicsCompressorProps = NodeProps<"dynamicsCompressor">;

function sync(
  comp: DynamicsCompressorNodeLike,
  next: DynamicsCompressorProps,
  prev: DynamicsCompressorProps | null,
) {
  syncParam(comp.threshold, next.threshold, prev?.threshold);
  syncParam(comp.knee, next.knee, prev?.knee);
  syncParam(comp.ratio, next.ratio, prev?.ratio);
  syncParam(comp.attack, next.attack, prev?.attack);
  syncParam(comp.release, next.release, prev?.release);
}

function createDynamicsCompressorRuntime(
  ctx: AudioContextLike,
  props: DynamicsCompressorProps,
): AudioNodeInstance<"dynamicsCompressor"> {
  const comp = ctx.createDynamicsCompressor();
  sync(comp, props, null);

  return {
    kind: "dynamicsCompressor",
    input: comp,
    output: comp,
    getParam: () => null,
    update: (next, prev) => sync(comp, next, prev),
    onRemove: () => {
      comp.disconnect();
    },
  };
}

export const dynamicsCompressorAudioFactory: AudioNodeFactory<"dynamicsCompressor"> = {
  kind: "dynamicsCompressor",
  create: (ctx, props) => createDynamicsCompressorRuntime(ctx, props),
};
