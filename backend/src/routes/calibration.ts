import { Express, Request, Response } from 'express';
import { RiskConfiguration } from '../utils/risk-config.js';

export const registerCalibrationRoute = (app: Express, config: RiskConfiguration) => {
  app.get('/api/calibration', (_req: Request, res: Response) => {
    res.json({
      errorModels: config.calibration.errorModels,
      indicators: config.calibration.indicators,
      severityThresholds: config.calibration.severityThresholds,
      severityColors: config.calibration.severityColors,
      classificationBands: config.classificationTables,
    });
  });
};
