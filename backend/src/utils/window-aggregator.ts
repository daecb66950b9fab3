import { ForecastSeries, validateForecastSeries } from './forecast-series.js';

export const MOVING_AVERAGE_WINDOW_HOURS = 8;
// Window for center t spans t-3 .. t+4.
const HOURS_BEFORE_CENTER = 3;
const HOURS_AFTER_CENTER = MOVING_AVERAGE_WINDOW_HOURS - HOURS_BEFORE_CENTER - 1;

export interface WindowAverage {
  readonly centerHour: number;
  readonly average: number;
}

// Expects a series that has already passed validateForecastSeries.
export const completeWindowAverages = (points: ForecastSeries): readonly WindowAverage[] => {
  const windows: WindowAverage[] = [];

  for (let center = HOURS_BEFORE_CENTER; center < points.length - HOURS_AFTER_CENTER; center += 1) {
    let sum = 0;
    for (let offset = -HOURS_BEFORE_CENTER; offset <= HOURS_AFTER_CENTER; offset += 1) {
      sum += points[center + offset].predictedValue;
    }
    windows.push(Object.freeze({ centerHour: points[center].hourOffset, average: sum / MOVING_AVERAGE_WINDOW_HOURS }));
  }

  return Object.freeze(windows);
};

/**
 * Centered 8-hour moving averages over a 24-hour forecast. Only complete
 * windows are returned (centers 4..20); edge centers are dropped, never
 * clipped or padded.
 */
export const movingAverage8h = (series: ForecastSeries): readonly WindowAverage[] =>
  completeWindowAverages(validateForecastSeries(series));
