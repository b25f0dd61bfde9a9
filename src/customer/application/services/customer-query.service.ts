import { Inject, Injectable } from '@nestjs/common';
import { ICustomerRepository } from '../interfaces/customer-repository.interface';
import { Customer } from '../../domain/entities/customer.entity';
import { Interaction } from '../../domain/entities/interaction.entity';
import { INJECTION_TOKENS } from '../../../shared/constants/injection-tokens';

export interface CustomerMatch {
  position: number;
  customer: Customer;
}

export interface InteractionMatch {
  customerPosition: number;
  customer: Customer;
  interactionPosition: number;
  interaction: Interaction;
}

/**
 * Read-only search over the store. Results are lazy and restartable: every
 * iteration walks the store as it is at that moment, nothing is cached.
 */
@Injectable()
export class CustomerQueryService {
  constructor(
    @Inject(INJECTION_TOKENS.CUSTOMER_REPOSITORY)
    private readonly repository: ICustomerRepository,
  ) {}

  searchCustomers(term: string): Iterable<CustomerMatch> {
    const repository = this.repository;
    return {
      *[Symbol.iterator]() {
        const customers = repository.list();
        for (let position = 0; position < customers.length; position++) {
          const customer = customers[position];
          if (customer.matches(term)) {
            yield { position, customer };
          }
        }
      },
    };
  }

  searchInteractions(term: string): Iterable<InteractionMatch> {
    const repository = this.repository;
    return {
      *[Symbol.iterator]() {
        const customers = repository.list();
        for (let i = 0; i < customers.length; i++) {
          const customer = customers[i];
          const interactions = customer.interactions;
          for (let j = 0; j < interactions.length; j++) {
            if (interactions[j].matches(term)) {
              yield {
                customerPosition: i,
                customer,
                interactionPosition: j,
                interaction: interactions[j],
              };
            }
          }
        }
      },
    };
  }
}
