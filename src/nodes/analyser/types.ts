import { z } from "zod";

export const analyserPropsSchema = z.object({
  fftSize: z.number().int().positive().optional(),
  minDecibels: z.number().optional(),
  maxDecibels: z.number().optional(),
  smoothingTimeConstant: z.number().min(0).max(1).optional(),
});

export type AnalyserProps = z.output<typeof analyserPropsSchema>;

declare module "../../graph/types" {
  interface NodeTypeMap {
    analyser: AnalyserProps;
  }
}
