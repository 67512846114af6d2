import "./types";
import { decodeWith } from "../../graph/schemas";
import type { NodeModule } from "../../types/nodeModule";
import { mediaStreamDestinationAudioFactory } from "./audio";
import { mediaStreamDestinationPropsSchema } from "./types";

export const mediaStreamDestinationNode: NodeModule<"mediaStreamDestination"> = {
  kind: "mediaStreamDestination",
  wireTag: "MediaStreamDestination",
  decode: (raw) => decodeWith("mediaStreamDestination", mediaStreamDestinationPropsSchema, raw),
  audioFactory: mediaStreamDestinationAudioFactory,
};
