import { Injectable, Inject } from '@nestjs/common';
import {
  ICustomerRepository,
  SaveSummary,
} from '../interfaces/customer-repository.interface';
import { INJECTION_TOKENS } from '../../../shared/constants/injection-tokens';
import type { AppConfig } from '../../../shared/config/app.config';

export interface LoadResult {
  loaded: boolean;
  customers: number;
}

/** Saves and loads the store against the configured data files. */
@Injectable()
export class PersistCustomersUseCase {
  constructor(
    @Inject(INJECTION_TOKENS.CUSTOMER_REPOSITORY)
    private readonly repository: ICustomerRepository,
    @Inject(INJECTION_TOKENS.APP_CONFIG)
    private readonly config: AppConfig,
  ) {}

  async save(): Promise<SaveSummary> {
    return this.repository.save(this.config.files);
  }

  async load(): Promise<LoadResult> {
    const loaded = await this.repository.load(this.config.files);
    return { loaded, customers: this.repository.list().length };
  }
}
