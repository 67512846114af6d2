import "./types";
import { decodeWith } from "../../graph/schemas";
import type { NodeModule } from "../../types/nodeModule";
import { dynamicsCompressorAudioFactory } from "./audio";
import { dynamicsCompressorPropsSchema } from "./types";

export const dynamicsCompressorNode: NodeModule<"dynamicsCompressor"> = {
  kind: "dynamicsCompressor",
  wireTag: "DynamicsCompressor",
  decode: (raw) => decodeWith("dynamicsCompressor", dynamicsCompressorPropsSchema, raw),
  audioFactory: dynamicsCompressorAudioFactory,
};
