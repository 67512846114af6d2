import { z } from "zod";

export const channelSplitterPropsSchema = z.object({
  numberOfOutputs: z.number().int().positive().optional(),
});

export type ChannelSplitterProps = z.output<typeof channelSplitterPropsSchema>;

declare module "../../graph/types" {
  interface NodeTypeMap {
    channelSplitter: ChannelSplitterProps;
  }
}
