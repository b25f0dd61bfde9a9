import { Injectable, Inject, Logger } from '@nestjs/common';
import {
  CustomerChanges,
  ICustomerRepository,
} from '../interfaces/customer-repository.interface';
import { Customer } from '../../domain/entities/customer.entity';
import { INJECTION_TOKENS } from '../../../shared/constants/injection-tokens';

@Injectable()
export class UpdateCustomerUseCase {
  private readonly logger = new Logger(UpdateCustomerUseCase.name);

  constructor(
    @Inject(INJECTION_TOKENS.CUSTOMER_REPOSITORY)
    private readonly repository: ICustomerRepository,
  ) {}

  /** Empty or missing fields are left as they are. */
  execute(taxCode: string, changes: CustomerChanges): Customer {
    const customer = this.repository.update(taxCode, changes);
    this.logger.log(`Updated customer ${taxCode}`);
    return customer;
  }
}
