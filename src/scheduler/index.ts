import cron from 'node-cron';
import type { ScheduledTask } from 'node-cron';
import { createLogger } from '../utils/logger.js';
import { ConfigError } from '../utils/errors.js';
import type { RegistrySyncJob } from './RegistrySyncJob.js';

const logger = createLogger({ component: 'scheduler' });

export function scheduleRegistrySync(job: RegistrySyncJob, cronExpression: string): ScheduledTask {
  if (!cron.validate(cronExpression)) {
    throw new ConfigError(`Invalid REGISTRY_SYNC_CRON expression: ${cronExpression}`);
  }

  logger.info({ cronExpression }, 'Scheduling registry sync job');

  return cron.schedule(cronExpression, () => {
    job.run();
  });
}
