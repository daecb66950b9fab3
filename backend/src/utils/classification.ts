import { ForecastSeries, validateForecastSeries } from './forecast-series.js';
import { ConfigurationError, OutOfDomainError } from './risk-errors.js';

export const POLLUTANTS = ['O3', 'PM10', 'PM2.5'] as const;
export type Pollutant = (typeof POLLUTANTS)[number];

export const isPollutant = (value: unknown): value is Pollutant =>
  typeof value === 'string' && POLLUTANTS.some((pollutant) => pollutant === value);

/**
 * How a value that falls between two integer bounds is placed.
 * `lower-inclusive`: `min <= v < next.min` (57.5 ppb ozone stays Buena).
 * `upper-inclusive`: `v <= max` ("> 45 a 60": 45.5 µg/m³ PM10 is Aceptable).
 */
export type BandBoundary = 'lower-inclusive' | 'upper-inclusive';

export const BAND_BOUNDARIES: readonly BandBoundary[] = ['lower-inclusive', 'upper-inclusive'];

export const isBandBoundary = (value: unknown): value is BandBoundary =>
  typeof value === 'string' && BAND_BOUNDARIES.some((boundary) => boundary === value);

export interface ClassificationBand {
  readonly category: string;
  readonly color: string;
  readonly min: number;
  /** Inclusive upper bound; null on the open-ended top band. */
  readonly max: number | null;
}

export interface ClassificationTable {
  readonly boundary: BandBoundary;
  readonly bands: readonly ClassificationBand[];
}

export interface ClassificationResult {
  readonly category: string;
  readonly color: string;
}

/** Bands start at 0 and ascend contiguously on their integer grid; only the top band is open-ended. */
export const validateClassificationBands = (bands: readonly ClassificationBand[], tableName: string): readonly ClassificationBand[] => {
  if (bands.length === 0) {
    throw new ConfigurationError(`Classification table ${tableName} has no bands.`);
  }
  if (bands[0].min !== 0) {
    throw new ConfigurationError(`Classification table ${tableName} must start at 0, starts at ${bands[0].min}.`);
  }

  bands.forEach((band, index) => {
    const isTop = index === bands.length - 1;
    if (!band.category.trim()) {
      throw new ConfigurationError(`Classification table ${tableName} has a band without a category at position ${index}.`);
    }
    if (!Number.isFinite(band.min)) {
      throw new ConfigurationError(`Band ${band.category} in ${tableName} has a non-finite lower bound.`);
    }
    if (band.max === null) {
      if (!isTop) {
        throw new ConfigurationError(`Only the top band of ${tableName} may be open-ended; ${band.category} is not the top band.`);
      }
      return;
    }
    if (isTop) {
      throw new ConfigurationError(`Top band ${band.category} of ${tableName} must be open-ended.`);
    }
    if (!Number.isFinite(band.max) || band.max < band.min) {
      throw new ConfigurationError(`Band ${band.category} in ${tableName} has an invalid range [${band.min}, ${band.max}].`);
    }

    const next = bands[index + 1];
    if (next.min <= band.max) {
      throw new ConfigurationError(`Bands ${band.category} and ${next.category} in ${tableName} overlap.`);
    }
    if (next.min - band.max > 1) {
      throw new ConfigurationError(`Bands ${band.category} and ${next.category} in ${tableName} leave a gap.`);
    }
  });

  return Object.freeze(bands.map((band) => Object.freeze({ ...band })));
};

export const createClassificationTable = (
  bands: readonly ClassificationBand[],
  boundary: BandBoundary,
  tableName: string,
): ClassificationTable => Object.freeze({ boundary, bands: validateClassificationBands(bands, tableName) });

const containsValue = (concentration: number, bands: readonly ClassificationBand[], index: number, boundary: BandBoundary): boolean => {
  const band = bands[index];
  if (boundary === 'upper-inclusive') {
    return band.max === null || concentration <= band.max;
  }
  const next = bands[index + 1];
  return next === undefined || concentration < next.min;
};

/** First band containing the value under the table's boundary rule; the top band is open-ended. */
export const classify = (concentration: number, { boundary, bands }: ClassificationTable): ClassificationResult => {
  if (!Number.isFinite(concentration) || concentration < 0) {
    throw new OutOfDomainError(`Concentration must be a non-negative finite number, got ${concentration}.`);
  }

  for (let index = 0; index < bands.length; index += 1) {
    if (containsValue(concentration, bands, index, boundary)) {
      const { category, color } = bands[index];
      return Object.freeze({ category, color });
    }
  }

  throw new ConfigurationError('Classification table is empty.');
};

export type ClassificationTables = Readonly<Record<Pollutant, ClassificationTable>>;

export interface StationMarker extends ClassificationResult {
  readonly station: string;
  readonly maxForecast: number;
  /** Horizon hour (1..24) of the first point that reaches the maximum. */
  readonly peakHour: number;
}

export type NetworkPeak = StationMarker;

/**
 * Highest forecast across a set of station markers. The first station to
 * reach the maximum wins a tie; null when there are no markers.
 */
export const summarizeNetworkPeak = (markers: readonly StationMarker[]): NetworkPeak | null =>
  markers.reduce<NetworkPeak | null>((peak, marker) => (peak === null || marker.maxForecast > peak.maxForecast ? marker : peak), null);

export interface ClassificationEngine {
  readonly tables: ClassificationTables;
  classify: (pollutant: Pollutant, concentration: number) => ClassificationResult;
  /** Map-marker color for one station, keyed on its 24-hour maximum. */
  classifySeries: (pollutant: Pollutant, station: string, series: ForecastSeries) => StationMarker;
}

export const createClassificationEngine = (tables: ClassificationTables): ClassificationEngine =>
  Object.freeze({
    tables,
    classify: (pollutant: Pollutant, concentration: number) => classify(concentration, tables[pollutant]),
    classifySeries: (pollutant: Pollutant, station: string, series: ForecastSeries) => {
      const [first, ...rest] = validateForecastSeries(series);
      const peak = rest.reduce((best, point) => (point.predictedValue > best.predictedValue ? point : best), first);
      return Object.freeze({
        station,
        maxForecast: peak.predictedValue,
        peakHour: peak.hourOffset,
        ...classify(peak.predictedValue, tables[pollutant]),
      });
    },
  });
