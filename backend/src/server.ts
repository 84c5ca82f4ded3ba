import dotenv from 'dotenv';
import { createApp } from './app';
import { loadConfig } from './config/env';
import logger, { parseLogLevel } from './utils/logger';

dotenv.config();

const config = loadConfig();

logger.setLevel(parseLogLevel(config.logLevel));
if (config.logDir) {
  logger.enableFileOutput(config.logDir);
}

logger.info('======= Decision Analysis startup config =======', {
  port: config.port,
  host: config.host,
  nodeEnv: config.nodeEnv,
  model: config.geminiModel,
  mode: config.analysisMode,
  geminiApiKey: config.geminiApiKey ? '[SET]' : '[NOT SET]',
});
if (!config.geminiApiKey) {
  logger.warn('GEMINI_API_KEY environment variable not set. /api/generate_analysis will answer 500 until it is.');
}

const app = createApp({ config });

const server = app.listen(config.port, config.host, () => {
  logger.info(`Decision Analysis backend running at http://${config.host}:${config.port}`);
});

const shutdown = (signal: string) => {
  logger.info(`Received ${signal}, shutting down`);
  server.close((error) => {
    if (error) {
      logger.error('Error during shutdown', error);
      process.exit(1);
    }
    logger.close();
    process.exit(0);
  });
};

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
