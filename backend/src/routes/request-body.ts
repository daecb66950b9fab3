import { Pollutant, isPollutant } from '../utils/classification.js';
import { ForecastPoint, ForecastSeries, forecastSeriesFromValues, validateForecastSeries } from '../utils/forecast-series.js';
import { InputShapeError, RequestValidationError } from '../utils/risk-errors.js';

type JsonRecord = Record<string, unknown>;

export const MAX_STATIONS_PER_REQUEST = 500;
export const MAX_STATION_ID_LENGTH = 64;

const isRecord = (value: unknown): value is JsonRecord => typeof value === 'object' && value !== null && !Array.isArray(value);

export const requireBodyObject = (body: unknown): JsonRecord => {
  if (!isRecord(body)) {
    throw new RequestValidationError('Request body must be a JSON object.');
  }
  return body;
};

const toForecastPoint = (raw: unknown, index: number): ForecastPoint => {
  const record: JsonRecord = isRecord(raw) ? raw : {};
  const { hourOffset, predictedValue } = record;
  if (typeof hourOffset !== 'number' || typeof predictedValue !== 'number') {
    throw new InputShapeError(`series[${index}] must be an object with numeric hourOffset and predictedValue.`);
  }
  return { hourOffset, predictedValue };
};

/** Accepts either the raw `values` vector or an explicit `series` of hourly points. */
export const parseForecastSeries = (body: JsonRecord): ForecastSeries => {
  const { values, series } = body;

  if (Array.isArray(series)) {
    return validateForecastSeries(series.map(toForecastPoint));
  }
  if (Array.isArray(values)) {
    const numeric = values.map((value, index) => {
      if (typeof value !== 'number') {
        throw new InputShapeError(`values[${index}] must be a number.`);
      }
      return value;
    });
    return forecastSeriesFromValues(numeric);
  }

  throw new InputShapeError('Provide the forecast as "values" (24 numbers) or "series" (24 hourly points).');
};

export const parseStation = (body: JsonRecord): string | null => {
  const { station } = body;
  if (station === undefined || station === null) {
    return null;
  }
  if (typeof station !== 'string' || !station.trim()) {
    throw new RequestValidationError('station must be a non-empty string when provided.');
  }
  const trimmed = station.trim();
  if (trimmed.length > MAX_STATION_ID_LENGTH) {
    throw new RequestValidationError(`station must be at most ${MAX_STATION_ID_LENGTH} characters.`);
  }
  return trimmed;
};

export const parsePollutant = (body: JsonRecord, fallback: Pollutant = 'O3'): Pollutant => {
  const { pollutant } = body;
  if (pollutant === undefined) {
    return fallback;
  }
  if (!isPollutant(pollutant)) {
    throw new RequestValidationError('pollutant must be one of O3, PM10, PM2.5.');
  }
  return pollutant;
};

export const parseFiniteNumberField = (body: JsonRecord, key: string): number => {
  const value = body[key];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new RequestValidationError(`${key} must be a finite number.`);
  }
  return value;
};

export interface StationForecast {
  station: string;
  series: ForecastSeries;
}

export const parseStationForecasts = (body: JsonRecord): StationForecast[] => {
  const { stations } = body;
  if (!Array.isArray(stations) || stations.length === 0) {
    throw new RequestValidationError('stations must be a non-empty array.');
  }
  if (stations.length > MAX_STATIONS_PER_REQUEST) {
    throw new RequestValidationError(`At most ${MAX_STATIONS_PER_REQUEST} stations can be classified per request.`);
  }

  return stations.map((entry, index) => {
    const record = requireBodyObject(entry);
    const station = parseStation(record);
    if (station === null) {
      throw new RequestValidationError(`stations[${index}].station is required.`);
    }
    return { station, series: parseForecastSeries(record) };
  });
};
