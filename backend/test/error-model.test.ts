import {
  createErrorModel,
  standardNormalQuantile,
  standardNormalTail,
} from '../src/utils/error-model.js';
import { ConfigurationError } from '../src/utils/risk-errors.js';

const pointModel = createErrorModel({ mu: 5.08, sigma: 18.03 });

test('peak forecast of 168 ppb exceeds 150 ppb with probability ~0.90', () => {
  // 1 - Φ((150 - 168 - 5.08) / 18.03) = 1 - Φ(-1.2801)
  expect(pointModel.exceedanceProbability(168, 150)).toBeCloseTo(0.8997, 3);
});

test('probabilities stay within [0, 1] across extreme inputs', () => {
  const predictions = [0, 50, 168, 400, 5000];
  const thresholds = [-1000, 0, 50, 150, 1000, 1e6];
  predictions.forEach((predicted) => {
    thresholds.forEach((threshold) => {
      const probability = pointModel.exceedanceProbability(predicted, threshold);
      expect(probability).toBeGreaterThanOrEqual(0);
      expect(probability).toBeLessThanOrEqual(1);
    });
  });
});

test('raising the threshold never raises the probability', () => {
  let previous = pointModel.exceedanceProbability(100, 0);
  for (let threshold = 1; threshold <= 300; threshold += 1) {
    const current = pointModel.exceedanceProbability(100, threshold);
    expect(current).toBeLessThanOrEqual(previous);
    previous = current;
  }
});

test('repeated evaluation is bit-identical', () => {
  const first = pointModel.exceedanceProbability(87.3, 90);
  const second = pointModel.exceedanceProbability(87.3, 90);
  expect(Object.is(first, second)).toBe(true);
});

test('non-positive or non-finite sigma is a configuration error', () => {
  expect(() => createErrorModel({ mu: 0, sigma: 0 })).toThrow(ConfigurationError);
  expect(() => createErrorModel({ mu: 0, sigma: -6.11 })).toThrow(ConfigurationError);
  expect(() => createErrorModel({ mu: 0, sigma: Number.POSITIVE_INFINITY })).toThrow(ConfigurationError);
  expect(() => createErrorModel({ mu: Number.NaN, sigma: 1 })).toThrow(ConfigurationError);
});

test('model parameters are frozen', () => {
  expect(pointModel.params).toEqual({ mu: 5.08, sigma: 18.03 });
  expect(Object.isFrozen(pointModel.params)).toBe(true);
});

test('standard normal upper tail matches reference values', () => {
  expect(standardNormalTail(0)).toBeCloseTo(0.5, 6);
  expect(standardNormalTail(-1.959964)).toBeCloseTo(0.975, 6);
  expect(standardNormalTail(1)).toBeCloseTo(0.158655, 5);
});

test('upper tail keeps precision far from the mean', () => {
  const tail = standardNormalTail(6);
  expect(tail).toBeGreaterThan(0);
  expect(tail / 9.865876450377e-10).toBeCloseTo(1, 5);
});

test('quantile inverts the CDF', () => {
  expect(standardNormalQuantile(0.975)).toBeCloseTo(1.959964, 5);
  expect(standardNormalQuantile(0.5)).toBeCloseTo(0, 10);
  expect(standardNormalQuantile(0.01)).toBeCloseTo(-2.326348, 5);
  expect(standardNormalQuantile(0.999)).toBeCloseTo(3.090232, 5);
  expect(() => standardNormalQuantile(0)).toThrow(RangeError);
  expect(() => standardNormalQuantile(1)).toThrow(RangeError);
});
