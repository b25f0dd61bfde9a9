import { Injectable, Inject } from '@nestjs/common';
import { ICustomerRepository } from '../interfaces/customer-repository.interface';
import { Customer } from '../../domain/entities/customer.entity';
import { CustomerNotFoundException } from '../../domain/exceptions/customer-not-found.exception';
import { INJECTION_TOKENS } from '../../../shared/constants/injection-tokens';

export interface LocatedCustomer {
  position: number;
  customer: Customer;
}

@Injectable()
export class GetCustomerUseCase {
  constructor(
    @Inject(INJECTION_TOKENS.CUSTOMER_REPOSITORY)
    private readonly repository: ICustomerRepository,
  ) {}

  list(): LocatedCustomer[] {
    return this.repository
      .list()
      .map((customer, position) => ({ position, customer }));
  }

  byTaxCode(taxCode: string): LocatedCustomer {
    const position = this.repository.findByTaxCode(taxCode);
    if (position === null) {
      throw new CustomerNotFoundException(taxCode);
    }
    return this.locate(position);
  }

  /** First customer whose first and last name both match exactly, if any. */
  byName(firstName: string, lastName: string): LocatedCustomer | null {
    const position = this.repository.findByName(firstName, lastName);
    return position === null ? null : this.locate(position);
  }

  private locate(position: number): LocatedCustomer {
    return { position, customer: this.repository.list()[position] };
  }
}
