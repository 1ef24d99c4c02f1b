import { loadConfig, loadEnvFile } from './config';
import { createApp } from './app';
import { createLogger } from './utils/logger';

loadEnvFile();

const config = loadConfig();
const logger = createLogger({ dir: config.logDir, level: config.logLevel });
const app = createApp(config, { logger });

app.listen(config.port, () => {
  logger.info('server started', { port: config.port, outputDir: config.outputDir });
  console.log(`design spec server listening on http://localhost:${config.port}`);
});
