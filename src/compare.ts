import { Comparison, Threshold } from "./types";

export const MOST_COMMON_HEIGHT = 168;
export const BAND_SCALE = 20;

// code bands: near = 5 + 0.1c, far = 50 + 0.35c
export function codeThreshold(code: number): Threshold {
  return { near: 100 + 2 * code, far: 1000 + 7 * code };
}

// height bands: near = 3 + 0.1d, far = 15 + 0.35d, d = |h - 168|
export function heightThreshold(height: number): Threshold {
  const d = Math.abs(height - MOST_COMMON_HEIGHT);
  return { near: 60 + 2 * d, far: 300 + 7 * d };
}

/**
 * Where `target` sits relative to `guess`, quantized by the target's bands.
 * A distance landing exactly on a band edge falls into the inner bucket.
 */
export function compare(band: Threshold, target: number, guess: number): Comparison {
  if (target === guess) return Comparison.Correct;
  const distance = (target - guess) * BAND_SCALE;
  if (distance > band.near) {
    return distance > band.far ? Comparison.FarGreater : Comparison.Greater;
  }
  if (distance < -band.near) {
    return distance < -band.far ? Comparison.FarLess : Comparison.Less;
  }
  return Comparison.Near;
}
