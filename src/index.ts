import { config } from './config';
import { createApp } from './app';
import { createExtractor } from './services/extraction';
import { SessionRegistry } from './services/session-manager';
import { logger } from './utils/logger';
import { errorMessage } from './utils/errors';

function start() {
  try {
    const registry = new SessionRegistry(
      createExtractor(config.extractor),
      {
        extractionTimeoutMs: config.extractor.timeoutMs,
        enrichRecommendation: config.extractor.enrichRecommendation,
      },
      config.sessions,
    );
    const app = createApp(registry);
    app.listen(config.port, () => {
      logger.info(`Server running on port ${config.port}`, { extractor: config.extractor.kind, nodeEnv: config.nodeEnv });
    });
  } catch (err) {
    logger.error('Failed to start server', { error: errorMessage(err) });
    process.exit(1);
  }
}

start();
