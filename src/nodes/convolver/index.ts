import "./types";
import { decodeWith } from "../../graph/schemas";
import type { NodeModule } from "../../types/nodeModule";
import { convolverAudioFactory } from "./audio";
import { convolverPropsSchema } from "./types";

export const convolverNode: NodeModule<"convolver"> = {
  kind: "convolver",
  wireTag: "Convolver",
  decode: (raw) => decodeWith("convolver", convolverPropsSchema, raw),
  audioFactory: convolverAudioFactory,
  assets: (props) => (props.buffer ? [props.buffer] : []),
};
