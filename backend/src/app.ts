import express, { type Express } from 'express';
import cors from 'cors';
import type { AppConfig } from './config/env';
import { DEFAULT_VIEWS_DIR } from './controllers/pageController';
import { errorMiddleware, notFoundHandler } from './middlewares/errorHandler';
import { loggingMiddleware } from './middlewares/loggingMiddleware';
import { createAnalyzeRouter } from './routes/analyzeRoutes';
import { createPageRouter } from './routes/pageRoutes';
import { type AnalysisProvider, GeminiAnalysisProvider } from './services/geminiService';

export interface AppDependencies {
  config: AppConfig;
  /** Overrides the Gemini client; tests pass a stub here. */
  provider?: AnalysisProvider;
  viewsDir?: string;
}

function resolveProvider(config: AppConfig, provider?: AnalysisProvider): AnalysisProvider | undefined {
  if (provider) {
    return provider;
  }
  if (config.geminiApiKey) {
    return new GeminiAnalysisProvider({ apiKey: config.geminiApiKey, model: config.geminiModel });
  }
  return undefined;
}

export function createApp({ config, provider, viewsDir = DEFAULT_VIEWS_DIR }: AppDependencies): Express {
  const app = express();

  app.use(cors({ origin: config.corsOrigin === '*' ? true : config.corsOrigin.split(',').map((o) => o.trim()) }));
  app.use(loggingMiddleware);

  app.get('/api/health', (_req, res) => {
    res.json({
      status: 'ok',
      providerConfigured: Boolean(config.geminiApiKey),
      mode: config.analysisMode,
      model: config.geminiModel,
      timestamp: new Date().toISOString(),
    });
  });

  app.use('/api', createAnalyzeRouter({ config, provider: resolveProvider(config, provider) }));
  app.use(createPageRouter(viewsDir));

  app.use(notFoundHandler);
  app.use(errorMiddleware);

  return app;
}
