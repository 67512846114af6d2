import { z } from "zod";
import { ParamSchema } from "../../graph/schemas";

export const gainPropsSchema = z.object({
  gain: ParamSchema.optional(),
});

export type GainProps = z.output<typeof gainPropsSchema>;

declare module "../../graph/types" {
  interface NodeTypeMap {
    gain: GainProps;
  }
}
