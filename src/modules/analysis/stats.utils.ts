/**
 * Statistics Utilities
 *
 * Reducers over plain number arrays. Callers strip MISSING cells first;
 * an empty input yields NaN rather than a made-up default.
 */

import { isMissing, type Dataset } from '../dataset/index.js';

/**
 * Non-missing values of one matrix column, in row order
 */
export function presentValues(dataset: Dataset, offset: number): number[] {
  const out: number[] = [];
  for (const row of dataset.matrix) {
    const cell = row[offset];
    if (!isMissing(cell)) out.push(cell);
  }
  return out;
}

export function mean(xs: readonly number[]): number {
  if (!xs.length) return NaN;
  return xs.reduce((s, x) => s + x, 0) / xs.length;
}

export function median(xs: readonly number[]): number {
  const n = xs.length;
  if (!n) return NaN;
  const sorted = [...xs].sort((a, b) => a - b);
  const mid = Math.floor(n / 2);
  return n % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

/**
 * Population standard deviation (divides by n)
 */
export function populationStd(xs: readonly number[]): number {
  if (!xs.length) return NaN;
  const m = mean(xs);
  const variance = xs.reduce((s, x) => s + (x - m) * (x - m), 0) / xs.length;
  return Math.sqrt(variance);
}

export function min(xs: readonly number[]): number {
  if (!xs.length) return NaN;
  let lo = xs[0];
  for (const x of xs) if (x < lo) lo = x;
  return lo;
}

export function max(xs: readonly number[]): number {
  if (!xs.length) return NaN;
  let hi = xs[0];
  for (const x of xs) if (x > hi) hi = x;
  return hi;
}

export function clamp(x: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, x));
}

/**
 * Pearson correlation of two equal-length series.
 * NaN when either series is empty or has zero variance.
 */
export function pearson(xs: readonly number[], ys: readonly number[]): number {
  const n = Math.min(xs.length, ys.length);
  if (!n) return NaN;

  const mx = mean(xs.slice(0, n));
  const my = mean(ys.slice(0, n));

  let sxy = 0;
  let sxx = 0;
  let syy = 0;
  for (let i = 0; i < n; i++) {
    const dx = xs[i] - mx;
    const dy = ys[i] - my;
    sxy += dx * dy;
    sxx += dx * dx;
    syy += dy * dy;
  }

  if (sxx === 0 || syy === 0) return NaN;
  return clamp(sxy / Math.sqrt(sxx * syy), -1, 1);
}
