import { Express } from 'express';
import { createApp } from './src/server/create-app.js';
import { startServer as startBackendServer } from './src/server/start-server.js';
import {
  PORT,
  IS_PRODUCTION,
  IS_TEST,
  RATE_LIMIT_WINDOW_MS,
  RATE_LIMIT_MAX_REQUESTS,
  CORS_ALLOWLIST,
  CALIBRATION_FILE,
  CLASSIFICATION_BANDS_FILE,
} from './src/server/runtime.js';
import { createClassificationEngine } from './src/utils/classification.js';
import { createErrorModel } from './src/utils/error-model.js';
import { createIndicatorEngine } from './src/utils/indicator-engine.js';
import { RiskConfiguration, loadRiskConfiguration } from './src/utils/risk-config.js';
import { registerHealthRoutes } from './src/routes/health.js';
import { registerIndicatorRoutes } from './src/routes/indicators.js';
import { registerClassificationRoutes } from './src/routes/classification.js';
import { registerCalibrationRoute } from './src/routes/calibration.js';

export const createRiskApp = (riskConfig: RiskConfiguration): Express => {
  const indicatorEngine = createIndicatorEngine(riskConfig.calibration);
  const classificationEngine = createClassificationEngine(riskConfig.classificationTables);
  const intervalErrorModel = createErrorModel(riskConfig.calibration.errorModels.point);

  return createApp({
    isProduction: IS_PRODUCTION,
    corsAllowlist: CORS_ALLOWLIST,
    rateLimitWindowMs: RATE_LIMIT_WINDOW_MS,
    rateLimitMaxRequests: RATE_LIMIT_MAX_REQUESTS,
    registerRoutes: (app) => {
      registerHealthRoutes({ app, indicatorCount: riskConfig.calibration.indicators.length });
      registerIndicatorRoutes({ app, indicatorEngine, classificationEngine, intervalErrorModel });
      registerClassificationRoutes({ app, classificationEngine });
      registerCalibrationRoute(app, riskConfig);
    },
  });
};

// A bad calibration or band table must stop the process here, before listening.
export const riskConfig = loadRiskConfiguration({
  calibrationFile: CALIBRATION_FILE,
  bandsFile: CLASSIFICATION_BANDS_FILE,
});

export const app = createRiskApp(riskConfig);

if (!IS_TEST) {
  startBackendServer({ app, port: PORT });
}
