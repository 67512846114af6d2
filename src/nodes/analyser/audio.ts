import type { NodeProps } from "../../graph/types";
import type {
  AnalyserNodeLike,
  AudioContextLike,
  AudioNodeFactory,
  AudioNodeInstance,
} from "../../types/audioRuntime";
import { syncValue } from "../../utils/audio";

type AnalyserProps = NodeProps<"analyser">;

function sync(analyser: AnalyserNodeLike, next: AnalyserProps, prev: AnalyserProps | null) {
  syncValue(next.fftSize, prev?.fftSize, (v) => (analyser.fftSize = v));
  syncValue(next.minDecibels, prev?.minDecibels, (v) => (analyser.minDecibels = v));
  syncValue(next.maxDecibels, prev?.maxDecibels, (v) => (analyser.maxDecibels = v));
  syncValue(
    next.smoothingTimeConstant,
    prev?.smoothingTimeConstant,
    (v) => (analyser.smoothingTimeConstant = v),
  );
}

function createAnalyserRuntime(ctx: AudioContextLike, props: AnalyserProps): AudioNodeInstance<"analyser"> {
  const analyser = ctx.createAnalyser();
  sync(analyser, props, null);

  return {
    kind: "analyser",
    input: analyser,
    output: analyser,
    getParam: () => null,
    update: (next, prev) => sync(analyser, next, prev),
    onRemove: () => {
      analyser.disconnect();
    },
  };
}

export const analyserAudioFactory: AudioNodeFactory<"analyser"> = {
  kind: "analyser",
  create: (ctx, props) => createAnalyserRuntime(ctx, props),
};
