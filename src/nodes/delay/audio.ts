import type { NodeProps } from "../../graph/types";
import type { AudioContextLike, AudioNodeFactory, AudioNodeInstance } from "../../types/audioRuntime";
import { syncParam } from "../../utils/audio";

function createDelayRuntime(ctx: AudioContextLike, props: NodeProps<"delay">): AudioNodeInstance<"delay"> {
  const delay = ctx.createDelay(props.maxDelayTime);
  syncParam(delay.delayTime, props.delayTime, undefined);

  return {
    kind: "delay",
    input: delay,
    output: delay,
    getParam: (name) => (name === "delayTime" ? delay.delayTime : null),
    update: (next, prev) => {
      syncParam(delay.delayTime, next.delayTime, prev.delayTime);
    },
    onRemove: () => {
      delay.disconnect();
    },
  };
}

export const delayAudioFactory: AudioNodeFactory<"delay"> = {
  kind: "delay",
  create: (ctx, props) => createDelayRuntime(ctx, props),
};
