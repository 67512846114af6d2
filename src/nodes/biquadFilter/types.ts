import { z } from "zod";
import { BiquadFilterTypeSchema, ParamSchema } from "../../graph/schemas";

export const biquadFilterPropsSchema = z.object({
  type: BiquadFilterTypeSchema.optional(),
  frequency: ParamSchema.optional(),
  detune: ParamSchema.optional(),
  Q: ParamSchema.optional(),
  gain: ParamSchema.optional(),
});

export type BiquadFilterProps = z.output<typeof biquadFilterPropsSchema>;

declare module "../../graph/types" {
  interface NodeTypeMap {
    biquadFilter: BiquadFilterProps;
  }
}
