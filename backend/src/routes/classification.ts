import { Express, Request, Response } from 'express';
import { ClassificationEngine, summarizeNetworkPeak } from '../utils/classification.js';
import { parseFiniteNumberField, parsePollutant, parseStationForecasts, requireBodyObject } from './request-body.js';

interface RegisterClassificationRoutesOptions {
  app: Express;
  classificationEngine: ClassificationEngine;
}

export const registerClassificationRoutes = ({ app, classificationEngine }: RegisterClassificationRoutesOptions) => {
  app.post('/api/classify', (req: Request, res: Response) => {
    const body = requireBodyObject(req.body);
    const pollutant = parsePollutant(body);
    const concentration = parseFiniteNumberField(body, 'concentration');

    res.json({ pollutant, concentration, ...classificationEngine.classify(pollutant, concentration) });
  });

  app.post('/api/map-markers', (req: Request, res: Response) => {
    const body = requireBodyObject(req.body);
    const pollutant = parsePollutant(body);
    const markers = parseStationForecasts(body).map(({ station, series }) =>
      classificationEngine.classifySeries(pollutant, station, series),
    );

    res.json({ pollutant, markers, summary: summarizeNetworkPeak(markers) });
  });
};
