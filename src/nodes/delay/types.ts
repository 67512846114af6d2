import { z } from "zod";
import { ParamSchema } from "../../graph/schemas";

export const delayPropsSchema = z.object({
  delayTime: ParamSchema.optional(),
  /** Seconds. Fixed at construction; changing it rebuilds the node. */
  maxDelayTime: z.number().positive().optional(),
});

export type DelayProps = z.output<typeof delayPropsSchema>;

declare module "../../graph/types" {
  interface NodeTypeMap {
    delay: DelayProps;
  }
}
