import { z } from "zod";

export const mediaElementSourcePropsSchema = z.object({
  /** Host id of the `<audio>` or `<video>` element to tap. */
  mediaElement: z.string(),
});

export type MediaElementSourceProps = z.output<typeof mediaElementSourcePropsSchema>;

declare module "../../graph/types" {
  interface NodeTypeMap {
    mediaElementSource: MediaElementSourceProps;
  }
}
