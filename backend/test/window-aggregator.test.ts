import { forecastSeriesFromValues, validateForecastSeries } from '../src/utils/forecast-series.js';
import { InputShapeError } from '../src/utils/risk-errors.js';
import { completeWindowAverages, movingAverage8h } from '../src/utils/window-aggregator.js';
import { constantValues, rampSeries, seriesWith } from './fixtures.js';

test('a 24-hour series yields exactly 17 complete windows centered on hours 4..20', () => {
  const windows = movingAverage8h(rampSeries());
  expect(windows).toHaveLength(17);
  expect(windows.map((window) => window.centerHour)).toEqual(Array.from({ length: 17 }, (_, index) => index + 4));
});

test('each window spans three hours before and four after its center', () => {
  // For a ramp, mean(t-3 .. t+4) = t + 0.5
  const windows = movingAverage8h(rampSeries());
  expect(windows[0]).toEqual({ centerHour: 4, average: 4.5 });
  expect(windows[16]).toEqual({ centerHour: 20, average: 20.5 });
  windows.forEach((window) => {
    expect(window.average).toBe(window.centerHour + 0.5);
  });
});

test('edge hours only contribute through complete windows', () => {
  const windows = movingAverage8h(seriesWith(0, { 24: 800 }));
  const nonZero = windows.filter((window) => window.average > 0);
  expect(nonZero).toEqual([{ centerHour: 20, average: 100 }]);
});

test('rejects series that are not 24 consecutive hours', () => {
  expect(() => forecastSeriesFromValues(constantValues(40, 23))).toThrow(InputShapeError);
  expect(() => forecastSeriesFromValues(constantValues(40, 25))).toThrow(InputShapeError);

  const gapped = Array.from({ length: 24 }, (_, index) => ({
    hourOffset: index < 4 ? index + 1 : index + 2,
    predictedValue: 40,
  }));
  expect(() => movingAverage8h(gapped)).toThrow(InputShapeError);

  const reversed = Array.from({ length: 24 }, (_, index) => ({ hourOffset: 24 - index, predictedValue: 40 }));
  expect(() => validateForecastSeries(reversed)).toThrow(/without gaps/);
});

test('rejects non-finite forecast values', () => {
  const values = constantValues(40);
  values[6] = Number.NaN;
  expect(() => forecastSeriesFromValues(values)).toThrow(/hour 7 is not a finite number/);
});

test('an already validated series is averaged without another validation pass', () => {
  const series = rampSeries();
  expect(completeWindowAverages(series)).toEqual(movingAverage8h(series));
  expect(completeWindowAverages(series)).toHaveLength(17);
});
