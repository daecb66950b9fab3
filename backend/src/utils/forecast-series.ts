import { InputShapeError } from './risk-errors.js';

export const FORECAST_HORIZON_HOURS = 24;

export interface ForecastPoint {
  readonly hourOffset: number;
  readonly predictedValue: number;
}

/** Hours 1..24 ahead, one point per hour. */
export type ForecastSeries = readonly ForecastPoint[];

export const validateForecastSeries = (series: readonly ForecastPoint[]): ForecastSeries => {
  if (series.length !== FORECAST_HORIZON_HOURS) {
    throw new InputShapeError(`Forecast series must contain exactly ${FORECAST_HORIZON_HOURS} hourly points, got ${series.length}.`);
  }

  series.forEach((point, index) => {
    const expectedHour = index + 1;
    if (!Number.isInteger(point.hourOffset) || point.hourOffset !== expectedHour) {
      throw new InputShapeError(`Forecast hour offsets must run 1..${FORECAST_HORIZON_HOURS} without gaps; position ${index} has hour ${point.hourOffset}.`);
    }
    if (!Number.isFinite(point.predictedValue)) {
      throw new InputShapeError(`Forecast value at hour ${point.hourOffset} is not a finite number.`);
    }
  });

  return Object.freeze(series.map((point) => Object.freeze({ hourOffset: point.hourOffset, predictedValue: point.predictedValue })));
};

// Raw model output arrives as the hour_p01..hour_p24 vector.
export const forecastSeriesFromValues = (values: readonly number[]): ForecastSeries =>
  validateForecastSeries(values.map((predictedValue, index) => ({ hourOffset: index + 1, predictedValue })));

export const seriesMaximum = (series: ForecastSeries): number =>
  series.reduce((max, point) => Math.max(max, point.predictedValue), Number.NEGATIVE_INFINITY);
