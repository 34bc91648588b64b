import express from 'express';
import cookieParser from 'cookie-parser';
import type { AppConfig } from './config.js';
import type { PredictionStore } from './predictionStore.js';
import type { PredictionEngine } from './reasoner/engine.js';
import type { PresetTable } from './reasoner/probabilityTable.js';
import calculatorRoutes from './routes/calculator.js';
import dashboardRoutes from './routes/dashboard.js';
import mlRoutes from './routes/ml.js';

export interface AppDeps {
  engine: PredictionEngine;
  store: PredictionStore;
  presets: PresetTable;
  config: AppConfig;
}

export function createApp(deps: AppDeps) {
  const app = express();
  app.use(express.json());
  app.use(cookieParser());

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', diseases: deps.engine.listDiseases().length });
  });

  // routes
  app.use('/api/ml', mlRoutes(deps));
  app.use('/api/calculator', calculatorRoutes(deps));
  app.use('/api', dashboardRoutes(deps));

  return app;
}
