import express, { Router } from 'express';
import type { AppConfig } from '../config/env';
import { createAnalysisHandler, rejectUnconfiguredRequest } from '../controllers/analysisController';
import { AnalysisService } from '../services/analysisService';
import type { AnalysisProvider } from '../services/geminiService';

export const MAX_BODY_SIZE = '1mb';

export function createAnalyzeRouter(deps: { config: AppConfig; provider?: AnalysisProvider }): Router {
  const router = Router();

  // Without a key the body is never read: the configuration error wins over any input error
  if (!deps.config.geminiApiKey || !deps.provider) {
    router.post('/generate_analysis', rejectUnconfiguredRequest);
    return router;
  }

  const service = new AnalysisService({ provider: deps.provider, mode: deps.config.analysisMode });
  router.post('/generate_analysis', express.json({ limit: MAX_BODY_SIZE }), createAnalysisHandler({ service }));

  return router;
}
