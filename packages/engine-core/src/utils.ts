/** Clamp value to [min, max]. */
export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

const STEP_EPSILON = 1e-9;

/** Round up to the next multiple of step. Values a hair above a step (float noise) stay on it. */
export function roundUpTo(value: number, step: number): number {
  return Math.ceil(value / step - STEP_EPSILON) * step;
}
