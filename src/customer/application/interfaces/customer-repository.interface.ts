import { Customer } from '../../domain/entities/customer.entity';
import { Interaction } from '../../domain/entities/interaction.entity';

export interface DataFilePaths {
  customersFile: string;
  interactionsFile: string;
}

/** Fields accepted by `update`; empty strings leave a field unchanged. */
export type CustomerChanges = Partial<
  Pick<
    Customer,
    'firstName' | 'lastName' | 'email' | 'phone' | 'address' | 'birthDate'
  >
>;

export interface SaveSummary {
  customers: number;
  interactions: number;
}

/**
 * Interface defining what use cases need from the customer store.
 *
 * Using abstract class instead of interface because TypeScript interfaces
 * are erased at runtime and cannot serve as NestJS DI tokens.
 */
export abstract class ICustomerRepository {
  abstract list(): readonly Customer[];
  abstract get(taxCode: string): Customer | null;
  abstract add(customer: Customer): void;
  abstract findByTaxCode(taxCode: string): number | null;
  abstract findByName(firstName: string, lastName: string): number | null;
  abstract update(taxCode: string, changes: CustomerChanges): Customer;
  abstract remove(taxCode: string): Customer;
  abstract addInteraction(taxCode: string, interaction: Interaction): number;
  abstract removeInteraction(taxCode: string, position: number): Interaction;
  abstract save(paths: DataFilePaths): Promise<SaveSummary>;
  abstract load(paths: DataFilePaths): Promise<boolean>;
}
