import type { NodeProps } from "../../graph/types";
import type {
  AudioContextLike,
  AudioNodeFactory,
  AudioNodeInstance,
  AudioNodeServices,
  ConvolverNodeLike,
} from "../../types/audioRuntime";

type ConvolverProps = NodeProps<"convolver">;

// `normalize` is read when the buffer is assigned, so it goes first.
function assignBuffer(convolver: ConvolverNodeLike, props: ConvolverProps, services: AudioNodeServices) {
  if (props.normalize !== undefined) convolver.normalize = props.normalize;
  convolver.buffer = props.buffer ? services.getBuffer(props.buffer) : null;
}

function createConvolverRuntime(
  ctx: AudioContextLike,
  props: ConvolverProps,
  services: AudioNodeServices,
): AudioNodeInstance<"convolver"> {
  const convolver = ctx.createConvolver();
  assignBuffer(convolver, props, services);

  return {
    kind: "convolver",
    input: convolver,
    output: convolver,
    getParam: () => null,
    update: (next, prev) => {
      if (next.buffer !== prev.buffer || next.normalize !== prev.normalize) {
        assignBuffer(convolver, next, services);
      }
    },
    onRemove: () => {
      convolver.disconnect();
    },
  };
}

export const convolverAudioFactory: AudioNodeFactory<"convolver"> = {
  kind: "convolver",
  create: createConvolverRuntime,
};
