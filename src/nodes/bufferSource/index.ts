import "./types";
import { decodeWith } from "../../graph/schemas";
import type { NodeModule } from "../../types/nodeModule";
import { bufferSourceAudioFactory } from "./audio";
import { bufferSourcePropsSchema } from "./types";

export const bufferSourceNode: NodeModule<"bufferSource"> = {
  kind: "bufferSource",
  wireTag: "BufferSource",
  decode: (raw) => decodeWith("bufferSource", bufferSourcePropsSchema, raw),
  audioFactory: bufferSourceAudioFactory,
  assets: (props) => (props.buffer ? [props.buffer] : []),
  shouldRecreate: (next, prev) =>
    next.buffer !== prev.buffer ||
    next.startTime !== prev.startTime ||
    next.stopTime !== prev.stopTime ||
    next.loop !== prev.loop ||
    next.loopStart !== prev.loopStart ||
    next.loopEnd !== prev.loopEnd,
};
