import { z } from "zod";

export const channelMergerPropsSchema = z.object({
  numberOfInputs: z.number().int().positive().optional(),
});

export type ChannelMergerProps = z.output<typeof channelMergerPropsSchema>;

declare module "../../graph/types" {
  interface NodeTypeMap {
    channelMerger: ChannelMergerProps;
  }
}
