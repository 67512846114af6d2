import { z } from "zod";

export const mediaStreamSourcePropsSchema = z.object({
  /** Host id of a `MediaStream`, e.g. a microphone capture. */
  mediaStream: z.string(),
});

export type MediaStreamSourceProps = z.output<typeof mediaStreamSourcePropsSchema>;

declare module "../../graph/types" {
  interface NodeTypeMap {
    mediaStreamSource: MediaStreamSourceProps;
  }
}
