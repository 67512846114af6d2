import type { NodeProps } from "../../graph/types";
import type { AudioContextLike, AudioNodeFactory, AudioNodeInstance } from "../../types/audioRuntime";
import { syncParam, syncValue } from "../../utils/audio";

function createOscillatorRuntime(
  ctx: AudioContextLike,
  props: NodeProps<"oscillator">,
): AudioNodeInstance<"oscillator"> {
  const osc = ctx.createOscillator();
  syncValue(props.type, undefined, (v) => (osc.type = v));
  syncParam(osc.frequency, props.frequency, undefined);
  syncParam(osc.detune, props.detune, undefined);

  osc.start(props.startTime ?? 0);
  if (props.stopTime !== undefined) osc.stop(props.stopTime);

  return {
    kind: "oscillator",
    input: null,
    output: osc,
    getParam: (name) => {
      if (name === "frequency") return osc.frequency;
      if (name === "detune") return osc.detune;
      return null;
    },
    update: (next, prev) => {
      syncValue(next.type, prev.type, (v) => (osc.type = v));
      syncParam(osc.frequency, next.frequency, prev.frequency);
      syncParam(osc.detune, next.detune, prev.detune);
    },
    onRemove: () => {
      osc.stop();
      osc.disconnect();
    },
  };
}

export const oscillatorAudioFactory: AudioNodeFactory<"oscillator"> = {
  kind: "oscillator",
  create: (ctx, props) => createOscillatorRuntime(ctx, props),
};
