import { z } from "zod";
import type { PropsDecodeResult } from "@/types/nodeModule";
import { PARAM_DESTINATIONS } from "./types";
import type { AutomationMethod, Connection, Output, Param } from "./types";

const MethodSchema: z.ZodType<AutomationMethod, z.ZodTypeDef, unknown> = z.union([
  z
    .tuple([z.literal("setValueAtTime"), z.number(), z.number()])
    .transform(([type, value, startTime]) => ({ type, value, startTime })),
  z
    .tuple([z.literal("linearRampToValueAtTime"), z.number(), z.number()])
    .transform(([type, value, endTime]) => ({ type, value, endTime })),
  z
    .tuple([z.literal("exponentialRampToValueAtTime"), z.number(), z.number()])
    .transform(([type, value, endTime]) => ({ type, value, endTime })),
  z
    .tuple([z.literal("setTargetAtTime"), z.number(), z.number(), z.number()])
    .transform(([type, target, startTime, timeConstant]) => ({
      type,
      target,
      startTime,
      timeConstant,
    })),
  z
    .tuple([z.literal("setValueCurveAtTime"), z.array(z.number()), z.number(), z.number()])
    .transform(([type, values, startTime, duration]) => ({ type, values, startTime, duration })),
]);

/** A bare number, or an array of automation tuples whose first element names the method. */
export const ParamSchema: z.ZodType<Param, z.ZodTypeDef, unknown> = z.union([
  z.number(),
  z.array(MethodSchema),
]);

const ConnectionSchema = z.object({
  key: z.string(),
  destination: z.enum(PARAM_DESTINATIONS).optional(),
});

const TargetSchema: z.ZodType<Connection, z.ZodTypeDef, unknown> = z.union([
  z.string().transform((key) => ({ key })),
  ConnectionSchema,
]);

/** `"output"` field: absent or null, one target, or an array of targets. */
export const OutputSchema: z.ZodType<Output, z.ZodTypeDef, unknown> = z
  .union([z.null(), TargetSchema, z.array(TargetSchema)])
  .optional()
  .transform((v) => {
    if (v == null) return [];
    return Array.isArray(v) ? v : [v];
  });

/** Asset reference. An empty or missing URL means "no buffer". */
export const AssetUrlSchema = z.string().nullable().optional();

export const OscillatorTypeSchema = z.enum(["sine", "square", "sawtooth", "triangle"]);

export const BiquadFilterTypeSchema = z.enum([
  "lowpass",
  "highpass",
  "bandpass",
  "lowshelf",
  "highshelf",
  "peaking",
  "notch",
  "allpass",
]);

export const DistanceModelSchema = z.enum(["linear", "inverse", "exponential"]);

export const PanningModelSchema = z.enum(["equalpower", "HRTF"]);

export const OverSampleSchema = z.enum(["none", "2x", "4x"]);

/** Validate a node's fields with its schema and tag the result with its kind. */
export function decodeWith<TKind extends string, TBody extends object>(
  kind: TKind,
  schema: z.ZodType<TBody, z.ZodTypeDef, unknown>,
  raw: unknown,
): PropsDecodeResult<Readonly<{ kind: TKind }> & TBody> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    return { success: false, error: result.error.message };
  }
  return { success: true, props: { ...result.data, kind } };
}
