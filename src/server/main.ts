/**
 * Task API entry point
 */

import { loadServerConfig, toPipelineSettings } from '../config/index.js';
import { createLogger } from '../logger/index.js';
import { LocalFileStorageAdapter } from '../storage/index.js';
import { createApp } from './app.js';

const config = loadServerConfig();
const logger = createLogger('server', config.LOG_LEVEL);

const app = createApp({
  storage: new LocalFileStorageAdapter(config.OUTPUT_DIR),
  runner: { settings: toPipelineSettings(config), logger },
  corsOrigin: config.CORS_ORIGIN,
  logger,
});

app.listen(config.PORT, config.HOST, () => {
  logger.info(`Listening on http://${config.HOST}:${config.PORT}`, { outputDir: config.OUTPUT_DIR });
});
