import type { Param } from "@graph/types";
import { deepEqual } from "@graph/equality";
import type { AudioParamLike } from "@/types/audioRuntime";

/** Replace whatever is scheduled on `target` with `param`. */
export function applyParam(target: AudioParamLike, param: Param): void {
  target.cancelScheduledValues(0);
  if (typeof param === "number") {
    target.value = param;
    return;
  }
  for (const m of param) {
    switch (m.type) {
      case "setValueAtTime":
        target.setValueAtTime(m.value, m.startTime);
        break;
      case "linearRampToValueAtTime":
        target.linearRampToValueAtTime(m.value, m.endTime);
        break;
      case "exponentialRampToValueAtTime":
        target.exponentialRampToValueAtTime(m.value, m.endTime);
        break;
      case "setTargetAtTime":
        target.setTargetAtTime(m.target, m.startTime, m.timeConstant);
        break;
      case "setValueCurveAtTime":
        target.setValueCurveAtTime(Float32Array.from(m.values), m.startTime, m.duration);
        break;
    }
  }
}

/**
 * Write `next` to `target` unless it equals `prev`. An undefined `next` leaves
 * the runtime value alone.
 */
export function syncParam(
  target: AudioParamLike,
  next: Param | undefined,
  prev: Param | undefined,
): void {
  if (next === undefined || deepEqual(next, prev)) return;
  applyParam(target, next);
}

/** Scalar counterpart of `syncParam`. */
export function syncValue<T>(next: T | undefined, prev: T | undefined, set: (value: T) => void): void {
  if (next === undefined || deepEqual(next, prev)) return;
  set(next);
}
