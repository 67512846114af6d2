import type { NodeProps } from "../../graph/types";
import type {
  AudioContextLike,
  AudioNodeFactory,
  AudioNodeInstance,
  PannerNodeLike,
} from "../../types/audioRuntime";
import { syncParam, syncValue } from "../../utils/audio";

type PannerProps = NodeProps<"panner">;

function sync(panner: PannerNodeLike, next: PannerProps, prev: PannerProps | null) {
  syncValue(next.coneInnerAngle, prev?.coneInnerAngle, (v) => (panner.coneInnerAngle = v));
  syncValue(next.coneOuterAngle, prev?.coneOuterAngle, (v) => (panner.coneOuterAngle = v));
  syncValue(next.coneOuterGain, prev?.coneOuterGain, (v) => (panner.coneOuterGain = v));
  syncValue(next.distanceModel, prev?.distanceModel, (v) => (panner.distanceModel = v));
  syncValue(next.panningModel, prev?.panningModel, (v) => (panner.panningModel = v));
  syncValue(next.maxDistance, prev?.maxDistance, (v) => (panner.maxDistance = v));
  syncValue(next.refDistance, prev?.refDistance, (v) => (panner.refDistance = v));
  syncValue(next.rolloffFactor, prev?.rolloffFactor, (v) => (panner.rolloffFactor = v));
  syncParam(panner.positionX, next.positionX, prev?.positionX);
  syncParam(panner.positionY, next.positionY, prev?.positionY);
  syncParam(panner.positionZ, next.positionZ, prev?.positionZ);
  syncParam(panner.orientationX, next.orientationX, prev?.orientationX);
  syncParam(panner.orientationY, next.orientationY, prev?.orientationY);
  syncParam(panner.orientationZ, next.orientationZ, prev?.orientationZ);
}

function createPannerRuntime(ctx: AudioContextLike, props: PannerProps): AudioNodeInstance<"panner"> {
  const panner = ctx.createPanner();
  sync(panner, props, null);

  return {
    kind: "panner",
    input: panner,
    output: panner,
    getParam: () => null,
    update: (next, prev) => sync(panner, next, prev),
    onRemove: () => {
      panner.disconnect();
    },
  };
}

export const pannerAudioFactory: AudioNodeFactory<"panner"> = {
  kind: "panner",
  create: (ctx, props) => createPannerRuntime(ctx, props),
};
