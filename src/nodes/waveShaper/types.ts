import { z } from "zod";
import { OverSampleSchema } from "../../graph/schemas";

export const waveShaperPropsSchema = z.object({
  curve: z.array(z.number()).optional(),
  oversample: OverSampleSchema.optional(),
});

export type WaveShaperProps = z.output<typeof waveShaperPropsSchema>;

declare module "../../graph/types" {
  interface NodeTypeMap {
    waveShaper: WaveShaperProps;
  }
}
