import { ClassificationBand, ClassificationTable } from '../src/utils/classification.js';
import { ForecastSeries, forecastSeriesFromValues } from '../src/utils/forecast-series.js';
import { IndicatorCalibration } from '../src/utils/indicator-engine.js';

export const OZONE_CALIBRATION: IndicatorCalibration = {
  errorModels: {
    point: { mu: 5.08, sigma: 18.03 },
    'moving-average': { mu: -0.43, sigma: 6.11 },
  },
  indicators: [
    { id: 'moving-average-50', mode: 'moving-average', threshold: { value: 50, label: 'Media de más de 50 ppb en 8hrs' } },
    { id: 'point-90', mode: 'point', threshold: { value: 90, label: 'Umbral de 90 ppb' } },
    { id: 'point-120', mode: 'point', threshold: { value: 120, label: 'Umbral de 120 ppb' } },
    { id: 'point-150', mode: 'point', threshold: { value: 150, label: 'Umbral de 150 ppb' } },
  ],
  severityThresholds: { low: 0.2, medium: 0.5 },
  severityColors: { low: 'green', medium: 'yellow', high: 'red' },
};

export const OZONE_BANDS: readonly ClassificationBand[] = [
  { category: 'Buena', color: '#00E400', min: 0, max: 57 },
  { category: 'Aceptable', color: '#FFFF00', min: 58, max: 89 },
  { category: 'Mala', color: '#FF7E00', min: 90, max: 134 },
  { category: 'Muy Mala', color: '#FF0000', min: 135, max: 174 },
  { category: 'Extremadamente Mala', color: '#8F3F97', min: 175, max: null },
];

export const OZONE_TABLE: ClassificationTable = { boundary: 'lower-inclusive', bands: OZONE_BANDS };

export const constantValues = (value: number, hours = 24): number[] => Array.from({ length: hours }, () => value);

export const constantSeries = (value: number): ForecastSeries => forecastSeriesFromValues(constantValues(value));

/** Hour h forecasts h ppb. */
export const rampSeries = (): ForecastSeries => forecastSeriesFromValues(Array.from({ length: 24 }, (_, index) => index + 1));

/** `base` everywhere except the listed hours (1-based). */
export const seriesWith = (base: number, overrides: Record<number, number>): ForecastSeries =>
  forecastSeriesFromValues(Array.from({ length: 24 }, (_, index) => overrides[index + 1] ?? base));
