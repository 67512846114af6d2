import { z } from "zod";

export const mediaStreamDestinationPropsSchema = z.object({});

export type MediaStreamDestinationProps = z.output<typeof mediaStreamDestinationPropsSchema>;

declare module "../../graph/types" {
  interface NodeTypeMap {
    mediaStreamDestination: MediaStreamDestinationProps;
  }
}
