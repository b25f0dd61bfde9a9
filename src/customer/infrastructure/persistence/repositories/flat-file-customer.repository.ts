import { Injectable, Logger } from '@nestjs/common';
import { open, readFile } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import {
  CustomerChanges,
  DataFilePaths,
  ICustomerRepository,
  SaveSummary,
} from '../../../application/interfaces/customer-repository.interface';
import { Customer } from '../../../domain/entities/customer.entity';
import { Interaction } from '../../../domain/entities/interaction.entity';
import { CustomerNotFoundException } from '../../../domain/exceptions/customer-not-found.exception';
import { DuplicateCustomerException } from '../../../domain/exceptions/duplicate-customer.exception';
import { InteractionNotFoundException } from '../../../domain/exceptions/interaction-not-found.exception';
import { MalformedRecordException } from '../../../domain/exceptions/malformed-record.exception';
import { PersistenceException } from '../../../domain/exceptions/persistence.exception';
import { CustomerLineMapper } from '../mappers/customer-line.mapper';
import { InteractionLineMapper } from '../mappers/interaction-line.mapper';

const EDITABLE_FIELDS = [
  'firstName',
  'lastName',
  'email',
  'phone',
  'address',
  'birthDate',
] as const;

interface LoadStats {
  skipped: number;
  duplicates: number;
  interactions: number;
  orphaned: number;
}

/**
 * In-memory customer store persisted to two pipe-delimited text files.
 *
 * Customers own their interactions directly, so removing a customer removes
 * its interactions with it. Lookups are linear scans over insertion order.
 */
@Injectable()
export class FlatFileCustomerRepository implements ICustomerRepository {
  private readonly logger = new Logger(FlatFileCustomerRepository.name);
  private customers: Customer[] = [];
  private pendingIo: Promise<unknown> = Promise.resolve();

  list(): readonly Customer[] {
    return this.customers;
  }

  get(taxCode: string): Customer | null {
    const position = this.findByTaxCode(taxCode);
    return position === null ? null : this.customers[position];
  }

  add(customer: Customer): void {
    if (this.findByTaxCode(customer.taxCode) !== null) {
      throw new DuplicateCustomerException(customer.taxCode);
    }
    this.customers.push(customer);
    this.logger.debug(`Added customer ${customer.taxCode}`);
  }

  findByTaxCode(taxCode: string): number | null {
    const position = this.customers.findIndex((c) => c.taxCode === taxCode);
    return position === -1 ? null : position;
  }

  findByName(firstName: string, lastName: string): number | null {
    const position = this.customers.findIndex(
      (c) => c.firstName === firstName && c.lastName === lastName,
    );
    return position === -1 ? null : position;
  }

  update(taxCode: string, changes: CustomerChanges): Customer {
    const customer = this.require(taxCode);
    for (const field of EDITABLE_FIELDS) {
      const value = changes[field];
      if (value) {
        customer[field] = value;
      }
    }
    this.logger.debug(`Updated customer ${taxCode}`);
    return customer;
  }

  remove(taxCode: string): Customer {
    const position = this.findByTaxCode(taxCode);
    if (position === null) {
      throw new CustomerNotFoundException(taxCode);
    }
    const [removed] = this.customers.splice(position, 1);
    this.logger.debug(
      `Removed customer ${taxCode} with ${removed.interactions.length} interactions`,
    );
    return removed;
  }

  addInteraction(taxCode: string, interaction: Interaction): number {
    return this.require(taxCode).addInteraction(interaction);
  }

  removeInteraction(taxCode: string, position: number): Interaction {
    const removed = this.require(taxCode).removeInteraction(position);
    if (!removed) {
      throw new InteractionNotFoundException(taxCode, position);
    }
    return removed;
  }

  save(paths: DataFilePaths): Promise<SaveSummary> {
    return this.serialize(() => this.writeFiles(paths));
  }

  load(paths: DataFilePaths): Promise<boolean> {
    return this.serialize(() => this.readFiles(paths));
  }

  private require(taxCode: string): Customer {
    const customer = this.get(taxCode);
    if (!customer) {
      throw new CustomerNotFoundException(taxCode);
    }
    return customer;
  }

  // Runs file work one task at a time; failures reach the caller through
  // the returned promise and do not stall the tasks queued after it.
  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.pendingIo.then(task, task);
    this.pendingIo = run.catch(() => undefined);
    return run;
  }

  private async writeFiles(paths: DataFilePaths): Promise<SaveSummary> {
    const customerLines: string[] = [];
    const interactionLines: string[] = [];
    for (const customer of this.customers) {
      customerLines.push(CustomerLineMapper.toLine(customer));
      for (const interaction of customer.interactions) {
        interactionLines.push(
          InteractionLineMapper.toLine(customer.taxCode, interaction),
        );
      }
    }

    const customerFile = await this.openForWrite(paths.customersFile);
    const interactionFile = await this.openForWrite(
      paths.interactionsFile,
    ).catch(async (error: unknown): Promise<never> => {
      await customerFile.close();
      throw error;
    });

    try {
      await this.writeLines(customerFile, paths.customersFile, customerLines);
      await this.writeLines(
        interactionFile,
        paths.interactionsFile,
        interactionLines,
      );
    } finally {
      await Promise.all([customerFile.close(), interactionFile.close()]);
    }

    this.logger.log(
      `Saved ${customerLines.length} customers and ${interactionLines.length} interactions`,
    );
    return {
      customers: customerLines.length,
      interactions: interactionLines.length,
    };
  }

  private async openForWrite(path: string): Promise<FileHandle> {
    try {
      return await open(path, 'w');
    } catch (error) {
      throw new PersistenceException(path, error);
    }
  }

  private async writeLines(
    file: FileHandle,
    path: string,
    lines: readonly string[],
  ): Promise<void> {
    try {
      await file.writeFile(lines.map((line) => `${line}\n`).join(''), 'utf8');
    } catch (error) {
      throw new PersistenceException(path, error);
    }
  }

  private async readFiles(paths: DataFilePaths): Promise<boolean> {
    let customerText: string;
    let interactionText: string;
    try {
      [customerText, interactionText] = await Promise.all([
        readFile(paths.customersFile, 'utf8'),
        readFile(paths.interactionsFile, 'utf8'),
      ]);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.log(`No saved data to load: ${message}`);
      return false;
    }

    const stats: LoadStats = {
      skipped: 0,
      duplicates: 0,
      interactions: 0,
      orphaned: 0,
    };
    const loaded = this.decodeCustomers(customerText, stats);
    this.attachInteractions(loaded, interactionText, stats);

    // Swap in one step so no reader sees a partially loaded store
    this.customers = loaded;

    this.logger.log(
      `Loaded ${loaded.length} customers and ${stats.interactions} interactions ` +
        `(${stats.skipped} malformed lines skipped, ${stats.duplicates} duplicate customers, ` +
        `${stats.orphaned} orphaned interactions dropped)`,
    );
    return true;
  }

  private decodeCustomers(text: string, stats: LoadStats): Customer[] {
    const customers: Customer[] = [];
    const seen = new Set<string>();

    for (const line of readLines(text)) {
      const customer = this.decodeLine(line, stats, CustomerLineMapper.toDomain);
      if (!customer) continue;

      if (seen.has(customer.taxCode)) {
        stats.duplicates++;
        this.logger.warn(
          `Skipping duplicate customer ${customer.taxCode} in customer file`,
        );
        continue;
      }
      seen.add(customer.taxCode);
      customers.push(customer);
    }

    return customers;
  }

  private attachInteractions(
    customers: readonly Customer[],
    text: string,
    stats: LoadStats,
  ): void {
    for (const line of readLines(text)) {
      const owned = this.decodeLine(
        line,
        stats,
        InteractionLineMapper.toDomain,
      );
      if (!owned) continue;

      const owner = customers.find((c) => c.taxCode === owned.taxCode);
      if (!owner) {
        stats.orphaned++;
        this.logger.debug(
          `Dropping interaction for unknown customer ${owned.taxCode}`,
        );
        continue;
      }
      owner.addInteraction(owned.interaction);
      stats.interactions++;
    }
  }

  private decodeLine<T>(
    line: string,
    stats: LoadStats,
    decode: (line: string) => T,
  ): T | null {
    try {
      return decode(line);
    } catch (error) {
      if (!(error instanceof MalformedRecordException)) {
        throw error;
      }
      stats.skipped++;
      this.logger.warn(error.message);
      return null;
    }
  }
}

/** Non-blank lines of a data file, without their line terminators. */
function readLines(text: string): string[] {
  return text
    .split('\n')
    .map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line))
    .filter((line) => line.length > 0);
}
