import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { CheckHealthUseCase } from '../../src/customer/application/use-cases/check-health.use-case';
import { ICustomerRepository } from '../../src/customer/application/interfaces/customer-repository.interface';
import { Customer } from '../../src/customer/domain/entities/customer.entity';
import { loadAppConfig } from '../../src/shared/config/app.config';

describe('CheckHealthUseCase', () => {
  let repository: jest.Mocked<ICustomerRepository>;
  let dir: string;

  beforeEach(async () => {
    repository = {
      list: jest.fn(),
      get: jest.fn(),
      add: jest.fn(),
      findByTaxCode: jest.fn(),
      findByName: jest.fn(),
      update: jest.fn(),
      remove: jest.fn(),
      addInteraction: jest.fn(),
      removeInteraction: jest.fn(),
      save: jest.fn(),
      load: jest.fn(),
    } as jest.Mocked<ICustomerRepository>;
    repository.list.mockReturnValue([
      new Customer({ taxCode: 'A' }),
      new Customer({ taxCode: 'B' }),
    ]);

    dir = await mkdtemp(join(tmpdir(), 'customer-health-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should report the customer count and a writable data dir', async () => {
    const useCase = new CheckHealthUseCase(
      repository,
      loadAppConfig({ CRM_DATA_DIR: dir }),
    );

    const result = await useCase.execute();

    expect(result).toEqual({ customers: 2, dataDirWritable: true });
  });

  it('should report the data dir as not writable when it is missing', async () => {
    const useCase = new CheckHealthUseCase(
      repository,
      loadAppConfig({ CRM_DATA_DIR: join(dir, 'does-not-exist') }),
    );

    const result = await useCase.execute();

    expect(result.dataDirWritable).toBe(false);
  });
});
