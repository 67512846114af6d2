import type { NodeProps } from "../../graph/types";
import type {
  AudioContextLike,
  AudioNodeFactory,
  AudioNodeInstance,
  AudioNodeServices,
} from "../../types/audioRuntime";
import { syncParam, syncValue } from "../../utils/audio";

function createBufferSourceRuntime(
  ctx: AudioContextLike,
  props: NodeProps<"bufferSource">,
  services: AudioNodeServices,
): AudioNodeInstance<"bufferSource"> {
  const src = ctx.createBufferSource();
  src.buffer = props.buffer ? services.getBuffer(props.buffer) : null;
  syncValue(props.loop, undefined, (v) => (src.loop = v));
  syncValue(props.loopStart, undefined, (v) => (src.loopStart = v));
  syncValue(props.loopEnd, undefined, (v) => (src.loopEnd = v));
  syncParam(src.detune, props.detune, undefined);
  syncParam(src.playbackRate, props.playbackRate, undefined);

  src.start(props.startTime ?? 0);
  if (props.stopTime !== undefined) src.stop(props.stopTime);

  return {
    kind: "bufferSource",
    input: null,
    output: src,
    getParam: (name) => (name === "detune" ? src.detune : null),
    update: (next, prev) => {
      syncParam(src.detune, next.detune, prev.detune);
      syncParam(src.playbackRate, next.playbackRate, prev.playbackRate);
    },
    onRemove: () => {
      src.stop();
      src.disconnect();
    },
  };
}

export const bufferSourceAudioFactory: AudioNodeFactory<"bufferSource"> = {
  kind: "bufferSource",
  create: createBufferSourceRuntime,
};
