// Numeric helpers. Every function ignores null/NaN inputs and returns null
// where the statistic is undefined for what remains.

export type Num = number | null;

export function present(values: Num[]): number[] {
  return values.filter((v): v is number => v !== null && Number.isFinite(v));
}

export function mean(values: Num[]): Num {
  const xs = present(values);
  if (xs.length === 0) return null;
  return xs.reduce((a, b) => a + b, 0) / xs.length;
}

/** Sample variance (n - 1); a single observation has variance 0. */
export function sampleVariance(values: Num[]): Num {
  const xs = present(values);
  if (xs.length === 0) return null;
  if (xs.length === 1) return 0;
  const m = xs.reduce((a, b) => a + b, 0) / xs.length;
  return xs.reduce((acc, x) => acc + (x - m) ** 2, 0) / (xs.length - 1);
}

export function median(values: Num[]): Num {
  const xs = present(values).sort((a, b) => a - b);
  if (xs.length === 0) return null;
  const mid = Math.floor(xs.length / 2);
  return xs.length % 2 === 1 ? xs[mid] : (xs[mid - 1] + xs[mid]) / 2;
}

const FLAT_TOLERANCE = 1e-12;

function flat(sumSquares: number, n: number, center: number): boolean {
  return Math.sqrt(sumSquares / n) <= FLAT_TOLERANCE * Math.max(1, Math.abs(center));
}

/**
 * Pearson correlation over paired observations. Returns null for fewer than two
 * pairs or when either side has zero variance.
 */
export function pearson(pairs: Array<[number, number]>): Num {
  if (pairs.length < 2) return null;
  const n = pairs.length;
  const mx = pairs.reduce((a, [x]) => a + x, 0) / n;
  const my = pairs.reduce((a, [, y]) => a + y, 0) / n;
  let sxy = 0;
  let sxx = 0;
  let syy = 0;
  for (const [x, y] of pairs) {
    sxy += (x - mx) * (y - my);
    sxx += (x - mx) ** 2;
    syy += (y - my) ** 2;
  }
  // Spread at rounding-noise level counts as no variance
  if (flat(sxx, n, mx) || flat(syy, n, my)) return null;
  const r = sxy / Math.sqrt(sxx * syy);
  return Math.max(-1, Math.min(1, r));
}

/**
 * Min-max scaling to [0, 1]. Nulls stay null; a constant column maps to 0.
 */
export function minMaxNormalize(values: Num[]): Num[] {
  const xs = present(values);
  if (xs.length === 0) return values.map(() => null);
  const lo = Math.min(...xs);
  const hi = Math.max(...xs);
  return values.map((v) => {
    if (v === null || !Number.isFinite(v)) return null;
    return hi === lo ? 0 : (v - lo) / (hi - lo);
  });
}
