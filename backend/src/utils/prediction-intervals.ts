import { ErrorModel, standardNormalQuantile } from './error-model.js';
import { ForecastSeries, validateForecastSeries } from './forecast-series.js';
import { OutOfDomainError } from './risk-errors.js';

export const DEFAULT_INTERVAL_CONFIDENCE = 0.95;

export interface PredictionInterval {
  readonly hourOffset: number;
  readonly predicted: number;
  readonly lower: number;
  readonly upper: number;
}

// Bias-corrected forecast ± z·sigma; concentrations cannot go below zero.
export const predictionIntervals = (
  series: ForecastSeries,
  model: ErrorModel,
  confidence: number = DEFAULT_INTERVAL_CONFIDENCE,
): readonly PredictionInterval[] => {
  if (!(confidence > 0 && confidence < 1)) {
    throw new OutOfDomainError(`Interval confidence must be strictly between 0 and 1, got ${confidence}.`);
  }

  const { mu, sigma } = model.params;
  const halfWidth = standardNormalQuantile(0.5 + confidence / 2) * sigma;

  return Object.freeze(
    validateForecastSeries(series).map(({ hourOffset, predictedValue }) =>
      Object.freeze({
        hourOffset,
        predicted: predictedValue,
        lower: Math.max(0, predictedValue + mu - halfWidth),
        upper: predictedValue + mu + halfWidth,
      }),
    ),
  );
};
