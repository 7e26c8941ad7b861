/**
 * Descriptive statistics and least-squares fitting over plain number arrays
 */

export function mean(values: readonly number[]): number {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

export function populationStdDev(values: readonly number[]): number {
  const avg = mean(values);
  return Math.sqrt(mean(values.map((value) => (value - avg) ** 2)));
}

export interface LinearFit {
  slope: number;
  intercept: number;
  rSquared: number;
}

/**
 * Ordinary least squares of `ys` on `xs` (same length, at least one point).
 * Identical xs give a flat line through the mean; constant ys fit perfectly.
 */
export function linearFit(xs: readonly number[], ys: readonly number[]): LinearFit {
  const xMean = mean(xs);
  const yMean = mean(ys);

  let sxx = 0;
  let sxy = 0;
  for (const [index, x] of xs.entries()) {
    const y = ys[index] ?? yMean;
    sxx += (x - xMean) ** 2;
    sxy += (x - xMean) * (y - yMean);
  }

  const slope = sxx === 0 ? 0 : sxy / sxx;
  const intercept = yMean - slope * xMean;

  let ssRes = 0;
  let ssTot = 0;
  for (const [index, x] of xs.entries()) {
    const y = ys[index] ?? yMean;
    ssRes += (y - (intercept + slope * x)) ** 2;
    ssTot += (y - yMean) ** 2;
  }

  return { slope, intercept, rSquared: ssTot === 0 ? 1 : 1 - ssRes / ssTot };
}
