// Load environment variables first
import 'dotenv/config';

import { fileURLToPath } from 'node:url';
import { loadConfig } from './config/index.js';
import { createLogger } from './utils/logger.js';
import { RegistryBootstrapError } from './utils/errors.js';
import { ValidationEngine } from './core/validation/ValidationEngine.js';
import { ClassificationEngine } from './core/classification/ClassificationEngine.js';
import { HotReloadManager } from './core/registry/HotReloadManager.js';
import { IntentRegistryService } from './core/registry/IntentRegistryService.js';
import { IntentConfigRepository } from './persistence/repositories/IntentConfigRepository.js';
import { closeDatabase, getDatabase } from './persistence/database.js';
import { RegistrySyncJob } from './scheduler/RegistrySyncJob.js';
import { scheduleRegistrySync } from './scheduler/index.js';
import { startServer } from './server.js';

const logger = createLogger({ component: 'index' });

const DEFAULT_SEED_PATH = fileURLToPath(new URL('../data/intents.seed.json', import.meta.url));

async function main(): Promise<void> {
  logger.info('Starting intent registry service');

  try {
    const config = loadConfig();

    const validator = new ValidationEngine({ overlapWarningFloor: config.overlapWarningFloor });
    const manager = new HotReloadManager(validator, {
      defaultConfidenceThreshold: config.defaultConfidenceThreshold,
      fallback: { noMatchMessage: config.noMatchMessage },
    });
    const engine = new ClassificationEngine({
      weights: { exact: config.exactWeight, keyword: config.keywordWeight, fuzzy: config.fuzzyWeight },
      ambiguityMargin: config.ambiguityMargin,
      considerationFloor: config.considerationFloor,
      candidateCount: config.candidateCount,
      nearExactMaxDistance: config.nearExactMaxDistance,
    });
    const repository = new IntentConfigRepository(getDatabase(config.databasePath));

    const service = new IntentRegistryService(manager, engine, repository, {
      listDelimiter: config.listDelimiter,
      seedPath: config.seedPath ?? DEFAULT_SEED_PATH,
    });

    const snapshot = await service.initialize();
    logger.info({ version: snapshot.version, intents: snapshot.size }, 'Intent registry ready');

    const syncTask = config.registrySyncCron
      ? scheduleRegistrySync(new RegistrySyncJob(service), config.registrySyncCron)
      : null;

    const shutdown = (signal: string): void => {
      logger.info({ signal }, 'Shutting down');
      syncTask?.stop();
      closeDatabase();
      process.exit(0);
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);

    await startServer(service, config.port, config.host);

    logger.info({ host: config.host, port: config.port }, 'Server started successfully');
  } catch (error) {
    if (error instanceof RegistryBootstrapError) {
      logger.fatal({ error, report: error.report }, 'Intent registry could not be bootstrapped');
    } else {
      logger.error({ error }, 'Failed to start application');
    }
    process.exit(1);
  }
}

main().catch((error) => {
  console.error('Unhandled error:', error);
  process.exit(1);
});
