import { z } from "zod";
import { AssetUrlSchema, ParamSchema } from "../../graph/schemas";

export const bufferSourcePropsSchema = z.object({
  /** URL of the audio file to play. */
  buffer: AssetUrlSchema,
  startTime: z.number().nonnegative().optional(),
  stopTime: z.number().nonnegative().optional(),
  loop: z.boolean().optional(),
  loopStart: z.number().nonnegative().optional(),
  loopEnd: z.number().nonnegative().optional(),
  detune: ParamSchema.optional(),
  playbackRate: ParamSchema.optional(),
});

export type BufferSourceProps = z.output<typeof bufferSourcePropsSchema>;

declare module "../../graph/types" {
  interface NodeTypeMap {
    bufferSource: BufferSourceProps;
  }
}
