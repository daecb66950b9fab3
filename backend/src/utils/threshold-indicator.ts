import { ErrorModel } from './error-model.js';
import { ForecastSeries, seriesMaximum } from './forecast-series.js';
import { completeWindowAverages } from './window-aggregator.js';

export type AggregationMode = 'point' | 'moving-average';

export interface Threshold {
  readonly value: number;
  readonly label: string;
}

export interface IndicatorDefinition {
  readonly id: string;
  readonly mode: AggregationMode;
  readonly threshold: Threshold;
}

export type ErrorModelSet = Readonly<Record<AggregationMode, ErrorModel>>;

// The helpers below take a series already checked by validateForecastSeries.

/** Instantaneous peak risk: one probability against the 24-hour maximum. */
export const pointExceedanceProbability = (series: ForecastSeries, threshold: number, model: ErrorModel): number =>
  model.exceedanceProbability(seriesMaximum(series), threshold);

/** Sustained-exposure risk: the worst probability over every complete 8-hour window. */
export const movingAverageExceedanceProbability = (series: ForecastSeries, threshold: number, model: ErrorModel): number =>
  completeWindowAverages(series).reduce(
    (worst, window) => Math.max(worst, model.exceedanceProbability(window.average, threshold)),
    0,
  );

export const evaluateThresholdIndicator = (definition: IndicatorDefinition, series: ForecastSeries, models: ErrorModelSet): number => {
  switch (definition.mode) {
    case 'point':
      return pointExceedanceProbability(series, definition.threshold.value, models.point);
    case 'moving-average':
      return movingAverageExceedanceProbability(series, definition.threshold.value, models['moving-average']);
    default: {
      const unsupported: never = definition.mode;
      throw new Error(`Unsupported aggregation mode: ${String(unsupported)}`);
    }
  }
};
