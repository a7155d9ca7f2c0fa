// Windowed statistics over plain numeric arrays.
//
// All functions read the half-open range [start, end) of `values` so rule
// layers can work on a segment without copying it out of the frame.

/**
 * Rolling sample standard deviation (n - 1 denominator) with a trailing window.
 *
 * Returns one value per position in [start, end). The first `window - 1`
 * positions have no complete window and are `null`.
 */
export function rollingStd(
  values: ReadonlyArray<number>,
  window: number,
  start = 0,
  end = values.length
): Array<number | null> {
  if (!Number.isInteger(window) || window < 2) throw new Error(`invalid rolling window: ${window}`);

  const out: Array<number | null> = [];
  for (let i = start; i < end; i++) {
    const first = i - window + 1;
    if (first < start) {
      out.push(null);
      continue;
    }

    let sum = 0;
    for (let j = first; j <= i; j++) sum += values[j];
    const mean = sum / window;

    let sq = 0;
    for (let j = first; j <= i; j++) {
      const d = values[j] - mean;
      sq += d * d;
    }
    out.push(Math.sqrt(sq / (window - 1)));
  }
  return out;
}

/** Counts defined entries strictly greater than `threshold`. */
export function countAbove(series: ReadonlyArray<number | null>, threshold: number): number {
  let n = 0;
  for (const v of series) {
    if (v !== null && v > threshold) n++;
  }
  return n;
}

/**
 * Counts how many rolling std values over [start, end) exceed `threshold`.
 */
export function countRollingStdAbove(
  values: ReadonlyArray<number>,
  window: number,
  threshold: number,
  start = 0,
  end = values.length
): number {
  return countAbove(rollingStd(values, window, start, end), threshold);
}

/**
 * Discrete gradient with uniform sample spacing.
 *
 * Interior points use central differences, the two edges one-sided
 * differences. Needs at least two samples.
 */
export function gradient(
  values: ReadonlyArray<number>,
  spacing: number,
  start = 0,
  end = values.length
): number[] {
  const n = end - start;
  if (n < 2) throw new Error(`gradient needs at least 2 samples, got ${n}`);
  if (!(spacing > 0)) throw new Error(`invalid gradient spacing: ${spacing}`);

  const out = new Array<number>(n);
  out[0] = (values[start + 1] - values[start]) / spacing;
  for (let k = 1; k < n - 1; k++) {
    out[k] = (values[start + k + 1] - values[start + k - 1]) / (2 * spacing);
  }
  out[n - 1] = (values[end - 1] - values[end - 2]) / spacing;
  return out;
}

export function sum(values: ReadonlyArray<number>): number {
  let s = 0;
  for (const v of values) s += v;
  return s;
}
