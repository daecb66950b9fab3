import fs from 'node:fs';
import {
  BAND_BOUNDARIES,
  ClassificationBand,
  ClassificationTable,
  ClassificationTables,
  Pollutant,
  createClassificationTable,
  isBandBoundary,
} from './classification.js';
import { ErrorModelParams, createErrorModel } from './error-model.js';
import { IndicatorCalibration, Severity, SeverityThresholds } from './indicator-engine.js';
import { ConfigurationError } from './risk-errors.js';
import { AggregationMode, IndicatorDefinition } from './threshold-indicator.js';

export interface RiskConfiguration {
  readonly calibration: IndicatorCalibration;
  readonly classificationTables: ClassificationTables;
}

interface LoadRiskConfigurationOptions {
  calibrationFile: string;
  bandsFile: string;
}

type JsonRecord = Record<string, unknown>;

const AGGREGATION_MODES: readonly AggregationMode[] = ['point', 'moving-average'];

const isRecord = (value: unknown): value is JsonRecord => typeof value === 'object' && value !== null && !Array.isArray(value);

const isAggregationMode = (value: unknown): value is AggregationMode =>
  typeof value === 'string' && AGGREGATION_MODES.some((mode) => mode === value);

const readRecord = (source: JsonRecord, key: string, context: string): JsonRecord => {
  const value = source[key];
  if (!isRecord(value)) {
    throw new ConfigurationError(`${context}.${key} must be an object.`);
  }
  return value;
};

const readArray = (source: JsonRecord, key: string, context: string): unknown[] => {
  const value = source[key];
  if (!Array.isArray(value)) {
    throw new ConfigurationError(`${context}.${key} must be an array.`);
  }
  return value;
};

const readFiniteNumber = (source: JsonRecord, key: string, context: string): number => {
  const value = source[key];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ConfigurationError(`${context}.${key} must be a finite number.`);
  }
  return value;
};

const readString = (source: JsonRecord, key: string, context: string): string => {
  const value = source[key];
  if (typeof value !== 'string' || !value.trim()) {
    throw new ConfigurationError(`${context}.${key} must be a non-empty string.`);
  }
  return value;
};

const parseErrorModelParams = (source: JsonRecord, context: string): ErrorModelParams =>
  createErrorModel({
    mu: readFiniteNumber(source, 'mu', context),
    sigma: readFiniteNumber(source, 'sigma', context),
  }).params;

const parseIndicatorDefinition = (raw: unknown, index: number): IndicatorDefinition => {
  const context = `indicators[${index}]`;
  if (!isRecord(raw)) {
    throw new ConfigurationError(`${context} must be an object.`);
  }
  const mode = raw.mode;
  if (!isAggregationMode(mode)) {
    throw new ConfigurationError(`${context}.mode must be one of ${AGGREGATION_MODES.join(', ')}.`);
  }
  const threshold = readRecord(raw, 'threshold', context);
  return Object.freeze({
    id: readString(raw, 'id', context),
    mode,
    threshold: Object.freeze({
      value: readFiniteNumber(threshold, 'value', `${context}.threshold`),
      label: readString(threshold, 'label', `${context}.threshold`),
    }),
  });
};

const parseSeverityThresholds = (source: JsonRecord): SeverityThresholds => {
  const low = readFiniteNumber(source, 'low', 'severityThresholds');
  const medium = readFiniteNumber(source, 'medium', 'severityThresholds');
  if (low < 0 || medium > 1 || low > medium) {
    throw new ConfigurationError(`severityThresholds must satisfy 0 <= low <= medium <= 1, got low=${low}, medium=${medium}.`);
  }
  return Object.freeze({ low, medium });
};

const parseSeverityColors = (source: JsonRecord): Readonly<Record<Severity, string>> =>
  Object.freeze({
    low: readString(source, 'low', 'severityColors'),
    medium: readString(source, 'medium', 'severityColors'),
    high: readString(source, 'high', 'severityColors'),
  });

export const parseIndicatorCalibration = (raw: unknown): IndicatorCalibration => {
  if (!isRecord(raw)) {
    throw new ConfigurationError('Calibration must be a JSON object.');
  }

  const errorModels = readRecord(raw, 'errorModels', 'calibration');
  const indicators = readArray(raw, 'indicators', 'calibration').map(parseIndicatorDefinition);
  if (indicators.length === 0) {
    throw new ConfigurationError('calibration.indicators must list at least one indicator.');
  }
  const seenIds = new Set<string>();
  indicators.forEach(({ id }) => {
    if (seenIds.has(id)) {
      throw new ConfigurationError(`Duplicate indicator id "${id}".`);
    }
    seenIds.add(id);
  });

  return Object.freeze({
    errorModels: Object.freeze({
      point: parseErrorModelParams(readRecord(errorModels, 'point', 'errorModels'), 'errorModels.point'),
      'moving-average': parseErrorModelParams(readRecord(errorModels, 'moving-average', 'errorModels'), 'errorModels.moving-average'),
    }),
    indicators: Object.freeze(indicators),
    severityThresholds: parseSeverityThresholds(readRecord(raw, 'severityThresholds', 'calibration')),
    severityColors: parseSeverityColors(readRecord(raw, 'severityColors', 'calibration')),
  });
};

const parseBand = (raw: unknown, context: string): ClassificationBand => {
  if (!isRecord(raw)) {
    throw new ConfigurationError(`${context} must be an object.`);
  }
  const rawMax = raw.max;
  let max: number | null = null;
  if (rawMax !== null) {
    if (typeof rawMax !== 'number' || !Number.isFinite(rawMax)) {
      throw new ConfigurationError(`${context}.max must be a finite number or null.`);
    }
    max = rawMax;
  }
  return {
    category: readString(raw, 'category', context),
    color: readString(raw, 'color', context),
    min: readFiniteNumber(raw, 'min', context),
    max,
  };
};

export const parseClassificationTables = (raw: unknown): ClassificationTables => {
  if (!isRecord(raw)) {
    throw new ConfigurationError('Classification bands must be a JSON object keyed by pollutant.');
  }
  const source = raw;

  const readTable = (pollutant: Pollutant): ClassificationTable => {
    const table = readRecord(source, pollutant, 'bands');
    const { boundary } = table;
    if (!isBandBoundary(boundary)) {
      throw new ConfigurationError(`bands.${pollutant}.boundary must be one of ${BAND_BOUNDARIES.join(', ')}.`);
    }
    const bands = readArray(table, 'bands', `bands.${pollutant}`).map((band, index) =>
      parseBand(band, `bands.${pollutant}.bands[${index}]`),
    );
    return createClassificationTable(bands, boundary, pollutant);
  };

  return Object.freeze({
    O3: readTable('O3'),
    PM10: readTable('PM10'),
    'PM2.5': readTable('PM2.5'),
  });
};

const readJsonFile = (filePath: string): unknown => {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read configuration file ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
  }
  try {
    return JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(`Configuration file ${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
};

export const loadRiskConfiguration = ({ calibrationFile, bandsFile }: LoadRiskConfigurationOptions): RiskConfiguration =>
  Object.freeze({
    calibration: parseIndicatorCalibration(readJsonFile(calibrationFile)),
    classificationTables: parseClassificationTables(readJsonFile(bandsFile)),
  });
