import { z } from "zod";
import { ParamSchema } from "../../graph/schemas";

export const stereoPannerPropsSchema = z.object({
  pan: ParamSchema.optional(),
});

export type StereoPannerProps = z.output<typeof stereoPannerPropsSchema>;

declare module "../../graph/types" {
  interface NodeTypeMap {
    stereoPanner: StereoPannerProps;
  }
}
