import { z } from "zod";
import { DistanceModelSchema, PanningModelSchema, ParamSchema } from "../../graph/schemas";

export const pannerPropsSchema = z.object({
  coneInnerAngle: z.number().optional(),
  coneOuterAngle: z.number().optional(),
  coneOuterGain: z.number().min(0).max(1).optional(),
  distanceModel: DistanceModelSchema.optional(),
  panningModel: PanningModelSchema.optional(),
  maxDistance: z.number().positive().optional(),
  refDistance: z.number().nonnegative().optional(),
  rolloffFactor: z.number().nonnegative().optional(),
  positionX: ParamSchema.optional(),
  positionY: ParamSchema.optional(),
  positionZ: ParamSchema.optional(),
  orientationX: ParamSchema.optional(),
  orientationY: ParamSchema.optional(),
  orientationZ: ParamSchema.optional(),
});

export type PannerProps = z.output<typeof pannerPropsSchema>;

declare module "../../graph/types" {
  interface NodeTypeMap {
    panner: PannerProps;
  }
}
