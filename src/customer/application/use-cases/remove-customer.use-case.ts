import { Injectable, Inject, Logger } from '@nestjs/common';
import { ICustomerRepository } from '../interfaces/customer-repository.interface';
import { Customer } from '../../domain/entities/customer.entity';
import { INJECTION_TOKENS } from '../../../shared/constants/injection-tokens';

@Injectable()
export class RemoveCustomerUseCase {
  private readonly logger = new Logger(RemoveCustomerUseCase.name);

  constructor(
    @Inject(INJECTION_TOKENS.CUSTOMER_REPOSITORY)
    private readonly repository: ICustomerRepository,
  ) {}

  execute(taxCode: string): Customer {
    const removed = this.repository.remove(taxCode);
    this.logger.log(
      `Removed customer ${taxCode} (${removed.interactions.length} interactions discarded)`,
    );
    return removed;
  }
}
