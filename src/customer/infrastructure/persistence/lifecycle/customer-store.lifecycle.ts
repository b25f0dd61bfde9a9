import {
  Injectable,
  Inject,
  Logger,
  OnApplicationShutdown,
  OnModuleInit,
} from '@nestjs/common';
import { mkdir } from 'node:fs/promises';
import { PersistCustomersUseCase } from '../../../application/use-cases/persist-customers.use-case';
import { INJECTION_TOKENS } from '../../../../shared/constants/injection-tokens';
import type { AppConfig } from '../../../../shared/config/app.config';

/**
 * Loads the saved customers when the module starts and writes them back on
 * shutdown. A missing data file on first run is not an error.
 */
@Injectable()
export class CustomerStoreLifecycle
  implements OnModuleInit, OnApplicationShutdown
{
  private readonly logger = new Logger(CustomerStoreLifecycle.name);

  constructor(
    private readonly persistence: PersistCustomersUseCase,
    @Inject(INJECTION_TOKENS.APP_CONFIG)
    private readonly config: AppConfig,
  ) {}

  async onModuleInit(): Promise<void> {
    await mkdir(this.config.dataDir, { recursive: true });

    const result = await this.persistence.load();
    if (result.loaded) {
      this.logger.log(`Customer store ready with ${result.customers} records`);
    } else {
      this.logger.log('No saved data found, starting with an empty store');
    }
  }

  async onApplicationShutdown(signal?: string): Promise<void> {
    if (!this.config.saveOnShutdown) {
      return;
    }

    try {
      const summary = await this.persistence.save();
      this.logger.log(
        `Saved ${summary.customers} customers on shutdown${signal ? ` (${signal})` : ''}`,
      );
    } catch (error) {
      this.logger.error(
        'Failed to save customers on shutdown',
        error instanceof Error ? error.stack : String(error),
      );
      throw error;
    }
  }
}
