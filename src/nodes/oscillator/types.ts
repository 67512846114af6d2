import { z } from "zod";
import { OscillatorTypeSchema, ParamSchema } from "../../graph/schemas";

export const oscillatorPropsSchema = z.object({
  type: OscillatorTypeSchema.optional(),
  frequency: ParamSchema.optional(),
  detune: ParamSchema.optional(),
  /** Context time to start at; 0 or absent starts immediately. */
  startTime: z.number().nonnegative().optional(),
  stopTime: z.number().nonnegative().optional(),
});

export type OscillatorProps = z.output<typeof oscillatorPropsSchema>;

declare module "../../graph/types" {
  interface NodeTypeMap {
    oscillator: OscillatorProps;
  }
}
