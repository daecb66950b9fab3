import { ErrorModelParams, createErrorModel } from './error-model.js';
import { ForecastSeries, validateForecastSeries } from './forecast-series.js';
import { AggregationMode, ErrorModelSet, IndicatorDefinition, evaluateThresholdIndicator } from './threshold-indicator.js';

export type Severity = 'low' | 'medium' | 'high';

export interface SeverityThresholds {
  /** Probabilities below this are low. */
  readonly low: number;
  /** Probabilities up to and including this are medium; above it, high. */
  readonly medium: number;
}

export interface IndicatorCalibration {
  readonly errorModels: Readonly<Record<AggregationMode, ErrorModelParams>>;
  readonly indicators: readonly IndicatorDefinition[];
  readonly severityThresholds: SeverityThresholds;
  readonly severityColors: Readonly<Record<Severity, string>>;
}

export interface IndicatorResult {
  readonly id: string;
  readonly mode: AggregationMode;
  readonly label: string;
  readonly threshold: number;
  readonly probability: number;
  readonly severity: Severity;
  readonly severityColor: string;
}

export interface IndicatorEngine {
  readonly calibration: IndicatorCalibration;
  computeIndicators: (series: ForecastSeries) => readonly IndicatorResult[];
}

export const classifySeverity = (probability: number, thresholds: SeverityThresholds): Severity => {
  if (probability < thresholds.low) {
    return 'low';
  }
  if (probability <= thresholds.medium) {
    return 'medium';
  }
  return 'high';
};

export const createIndicatorEngine = (calibration: IndicatorCalibration): IndicatorEngine => {
  const models: ErrorModelSet = Object.freeze({
    point: createErrorModel(calibration.errorModels.point),
    'moving-average': createErrorModel(calibration.errorModels['moving-average']),
  });

  const computeIndicators = (series: ForecastSeries): readonly IndicatorResult[] => {
    const points = validateForecastSeries(series);
    return Object.freeze(
      calibration.indicators.map((definition) => {
        const probability = evaluateThresholdIndicator(definition, points, models);
        const severity = classifySeverity(probability, calibration.severityThresholds);
        return Object.freeze({
          id: definition.id,
          mode: definition.mode,
          label: definition.threshold.label,
          threshold: definition.threshold.value,
          probability,
          severity,
          severityColor: calibration.severityColors[severity],
        });
      }),
    );
  };

  return Object.freeze({ calibration, computeIndicators });
};
