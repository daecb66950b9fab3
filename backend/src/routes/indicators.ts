import { Express, Request, Response } from 'express';
import { ClassificationEngine } from '../utils/classification.js';
import { ErrorModel } from '../utils/error-model.js';
import { seriesMaximum } from '../utils/forecast-series.js';
import { IndicatorEngine } from '../utils/indicator-engine.js';
import { DEFAULT_INTERVAL_CONFIDENCE, predictionIntervals } from '../utils/prediction-intervals.js';
import { parseFiniteNumberField, parseForecastSeries, parseStation, requireBodyObject } from './request-body.js';

interface RegisterIndicatorRoutesOptions {
  app: Express;
  indicatorEngine: IndicatorEngine;
  classificationEngine: ClassificationEngine;
  intervalErrorModel: ErrorModel;
}

export const registerIndicatorRoutes = ({
  app,
  indicatorEngine,
  classificationEngine,
  intervalErrorModel,
}: RegisterIndicatorRoutesOptions) => {
  // Only ozone carries the exceedance indicator set.
  app.post('/api/indicators', (req: Request, res: Response) => {
    const body = requireBodyObject(req.body);
    const station = parseStation(body);
    const series = parseForecastSeries(body);
    const maxForecast = seriesMaximum(series);

    res.json({
      station,
      pollutant: 'O3',
      maxForecast,
      indicators: indicatorEngine.computeIndicators(series),
      classification: classificationEngine.classify('O3', maxForecast),
    });
  });

  app.post('/api/prediction-intervals', (req: Request, res: Response) => {
    const body = requireBodyObject(req.body);
    const confidence = body.confidence === undefined ? DEFAULT_INTERVAL_CONFIDENCE : parseFiniteNumberField(body, 'confidence');

    res.json({
      station: parseStation(body),
      confidence,
      intervals: predictionIntervals(parseForecastSeries(body), intervalErrorModel, confidence),
    });
  });
};
