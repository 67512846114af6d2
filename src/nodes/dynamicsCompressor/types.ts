import { z } from "zod";
import { ParamSchema } from "../../graph/schemas";

export const dynamicsCompressorPropsSchema = z.object({
  threshold: ParamSchema.optional(),
  knee: ParamSchema.optional(),
  ratio: ParamSchema.optional(),
  attack: ParamSchema.optional(),
  release: ParamSchema.optional(),
});

export type DynamicsCompressorProps = z.output<typeof dynamicsCompressorPropsSchema>;

declare module "../../graph/types" {
  interface NodeTypeMap {
    dynamicsCompressor: DynamicsCompressorProps;
  }
}
