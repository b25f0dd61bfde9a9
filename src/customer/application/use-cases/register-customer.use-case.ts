import { Injectable, Inject, Logger } from '@nestjs/common';
import { ICustomerRepository } from '../interfaces/customer-repository.interface';
import { Customer, CustomerParams } from '../../domain/entities/customer.entity';
import { INJECTION_TOKENS } from '../../../shared/constants/injection-tokens';

@Injectable()
export class RegisterCustomerUseCase {
  private readonly logger = new Logger(RegisterCustomerUseCase.name);

  constructor(
    @Inject(INJECTION_TOKENS.CUSTOMER_REPOSITORY)
    private readonly repository: ICustomerRepository,
  ) {}

  execute(params: CustomerParams): Customer {
    const customer = new Customer(params);
    this.repository.add(customer);
    this.logger.log(`Registered customer ${customer.taxCode}`);
    return customer;
  }
}
