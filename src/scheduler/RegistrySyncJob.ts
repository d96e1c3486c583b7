import type { IntentRegistryService } from '../core/registry/IntentRegistryService.js';
import { createLogger } from '../utils/logger.js';

/** Picks up configuration versions published to the shared store by other processes. */
export class RegistrySyncJob {
  private readonly logger = createLogger({ job: 'RegistrySyncJob' });

  constructor(private readonly service: IntentRegistryService) {}

  run(): boolean {
    const logger = this.logger.child({ method: 'run' });
    try {
      const adopted = this.service.syncFromStore();
      if (adopted) {
        logger.info({ version: this.service.health().version }, 'Registry synced from store');
      }
      return adopted;
    } catch (error) {
      logger.error({ error }, 'Registry sync failed');
      return false;
    }
  }
}
