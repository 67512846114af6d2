import { z } from "zod";
import { AssetUrlSchema } from "../../graph/schemas";

export const convolverPropsSchema = z.object({
  /** URL of the impulse response. */
  buffer: AssetUrlSchema,
  normalize: z.boolean().optional(),
});

export type ConvolverProps = z.output<typeof convolverPropsSchema>;

declare module "../../graph/types" {
  interface NodeTypeMap {
    convolver: ConvolverProps;
  }
}
