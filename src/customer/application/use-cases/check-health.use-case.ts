import { Injectable, Inject } from '@nestjs/common';
import { access, constants } from 'node:fs/promises';
import { ICustomerRepository } from '../interfaces/customer-repository.interface';
import { INJECTION_TOKENS } from '../../../shared/constants/injection-tokens';
import type { AppConfig } from '../../../shared/config/app.config';

export interface HealthStatus {
  customers: number;
  dataDirWritable: boolean;
}

@Injectable()
export class CheckHealthUseCase {
  constructor(
    @Inject(INJECTION_TOKENS.CUSTOMER_REPOSITORY)
    private readonly repository: ICustomerRepository,
    @Inject(INJECTION_TOKENS.APP_CONFIG)
    private readonly config: AppConfig,
  ) {}

  async execute(): Promise<HealthStatus> {
    const dataDirWritable = await access(this.config.dataDir, constants.W_OK)
      .then(() => true)
      .catch(() => false);

    return {
      customers: this.repository.list().length,
      dataDirWritable,
    };
  }
}
