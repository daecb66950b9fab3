import { ConfigurationError } from './risk-errors.js';

export interface ErrorModelParams {
  readonly mu: number;
  readonly sigma: number;
}

export interface ErrorModel {
  readonly params: ErrorModelParams;
  /** P(observed > threshold) for a forecast of `predicted`. */
  exceedanceProbability: (predicted: number, threshold: number) => number;
}

const clampProbability = (value: number): number => Math.min(1, Math.max(0, value));

// Chebyshev fit of erfc, fractional error below 1.2e-7 everywhere.
const ERFC_COEFFICIENTS = [
  -1.26551223, 1.00002368, 0.37409196, 0.09678418, -0.18628806, 0.27886807, -1.13520398, 1.48851587, -0.82215223, 0.17087277,
];

const erfc = (x: number): number => {
  const z = Math.abs(x);
  const t = 1 / (1 + 0.5 * z);
  let poly = 0;
  for (let i = ERFC_COEFFICIENTS.length - 1; i >= 0; i -= 1) {
    poly = ERFC_COEFFICIENTS[i] + t * poly;
  }
  const result = t * Math.exp(-z * z + poly);
  return x >= 0 ? result : 2 - result;
};

/**
 * Upper tail 1 - Φ(z). Computed through erfc directly so that small tail
 * probabilities are not lost to cancellation.
 */
export const standardNormalTail = (z: number): number => 0.5 * erfc(z / Math.SQRT2);

// Rational approximation of the inverse normal CDF (relative error ~1.15e-9).
const QUANTILE_A = [-39.69683028665376, 220.9460984245205, -275.9285104469687, 138.357751867269, -30.66479806614716, 2.506628277459239];
const QUANTILE_B = [-54.47609879822406, 161.5858368580409, -155.6989798598866, 66.80131188771972, -13.28068155288572];
const QUANTILE_C = [-0.007784894002430293, -0.3223964580411365, -2.400758277161838, -2.549732539343734, 4.374664141464968, 2.938163982698783];
const QUANTILE_D = [0.007784695709041462, 0.3224671290700398, 2.445134137142996, 3.754408661907416];
const QUANTILE_TAIL = 0.02425;

const horner = (coefficients: readonly number[], x: number): number => coefficients.reduce((acc, coefficient) => acc * x + coefficient, 0);

const lowerTailQuantile = (p: number): number => {
  const q = Math.sqrt(-2 * Math.log(p));
  return horner(QUANTILE_C, q) / (horner(QUANTILE_D, q) * q + 1);
};

export const standardNormalQuantile = (p: number): number => {
  if (!(p > 0 && p < 1)) {
    throw new RangeError(`Quantile probability must be in (0, 1), got ${p}.`);
  }
  if (p < QUANTILE_TAIL) {
    return lowerTailQuantile(p);
  }
  if (p > 1 - QUANTILE_TAIL) {
    return -lowerTailQuantile(1 - p);
  }
  const q = p - 0.5;
  const r = q * q;
  return (horner(QUANTILE_A, r) * q) / (horner(QUANTILE_B, r) * r + 1);
};

export const createErrorModel = (params: ErrorModelParams): ErrorModel => {
  const { mu, sigma } = params;
  if (!Number.isFinite(mu)) {
    throw new ConfigurationError(`Error model mu must be a finite number, got ${mu}.`);
  }
  if (!Number.isFinite(sigma) || sigma <= 0) {
    throw new ConfigurationError(`Error model sigma must be a positive finite number, got ${sigma}.`);
  }

  const frozenParams: ErrorModelParams = Object.freeze({ mu, sigma });

  return Object.freeze({
    params: frozenParams,
    exceedanceProbability: (predicted: number, threshold: number): number =>
      clampProbability(standardNormalTail((threshold - predicted - mu) / sigma)),
  });
};
