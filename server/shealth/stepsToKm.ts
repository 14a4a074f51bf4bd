import type { StepsToKm } from "./types";

export type QuadraticCoeffs = readonly [number, number, number];

// km = A + B*steps + C*steps^2, fitted against Samsung Health days that carried a native distance.
export const PERSONAL_STEPS_TO_KM_COEFFS: QuadraticCoeffs = [0.129091492, 0.000589979242, 2.45535812e-8];

export const LEGACY_KM_PER_STEP = (0.0007376 + 0.0007614) / 2;

export function makeStepsToKm(coeffs: QuadraticCoeffs = PERSONAL_STEPS_TO_KM_COEFFS): StepsToKm {
  const [a, b, c] = coeffs;
  return (steps: number) => {
    if (!Number.isFinite(steps) || steps <= 0) return 0;
    return Math.max(0, a + b * steps + c * steps * steps);
  };
}

export const stepsToKm: StepsToKm = makeStepsToKm();

export function legacyStepsToKm(steps: number): number {
  if (!Number.isFinite(steps) || steps <= 0) return 0;
  return steps * LEGACY_KM_PER_STEP;
}

export function parseCoeffs(raw: string): QuadraticCoeffs | null {
  const parts = raw.split(",").map((p) => Number(p.trim()));
  if (parts.length !== 3 || parts.some((n) => !Number.isFinite(n))) return null;
  const [a, b, c] = parts;
  if (b < 0 || c < 0) return null;
  return [a, b, c];
}

export function roundKm(km: number): number {
  return Math.round(km * 100) / 100;
}
