import { Customer } from '../../src/customer/domain/entities/customer.entity';
import { Interaction } from '../../src/customer/domain/entities/interaction.entity';
import { InteractionKind } from '../../src/customer/domain/enums/interaction-kind.enum';
import { MalformedRecordException } from '../../src/customer/domain/exceptions/malformed-record.exception';
import { CustomerLineMapper } from '../../src/customer/infrastructure/persistence/mappers/customer-line.mapper';
import { InteractionLineMapper } from '../../src/customer/infrastructure/persistence/mappers/interaction-line.mapper';

describe('CustomerLineMapper', () => {
  const anna = new Customer({
    firstName: 'Anna',
    lastName: 'Rossi',
    email: 'a@x.it',
    phone: '000',
    address: 'Via Roma',
    taxCode: 'RSSANN80A01H501Z',
    birthDate: '01/01/1980',
  });

  it('should write the seven fields in file order', () => {
    expect(CustomerLineMapper.toLine(anna)).toBe(
      'Anna|Rossi|a@x.it|000|Via Roma|RSSANN80A01H501Z|01/01/1980',
    );
  });

  it('should keep empty fields as empty slots', () => {
    const sparse = new Customer({ firstName: 'Solo', taxCode: 'CODE1' });

    expect(CustomerLineMapper.toLine(sparse)).toBe('Solo|||||CODE1|');
  });

  it('should read a seven-field line into a customer without interactions', () => {
    const customer = CustomerLineMapper.toDomain(
      'Anna|Rossi|a@x.it|000|Via Roma|RSSANN80A01H501Z|01/01/1980',
    );

    expect(customer.firstName).toBe('Anna');
    expect(customer.lastName).toBe('Rossi');
    expect(customer.email).toBe('a@x.it');
    expect(customer.phone).toBe('000');
    expect(customer.address).toBe('Via Roma');
    expect(customer.taxCode).toBe('RSSANN80A01H501Z');
    expect(customer.birthDate).toBe('01/01/1980');
    expect(customer.interactions).toEqual([]);
  });

  it('should reject lines with too few or too many fields', () => {
    expect(() => CustomerLineMapper.toDomain('a|b|c|d|e')).toThrow(
      MalformedRecordException,
    );
    expect(() => CustomerLineMapper.toDomain('a|b|c|d|e|f|g|h')).toThrow(
      'Malformed customer record: expected 7 fields, got 8',
    );
  });
});

describe('InteractionLineMapper', () => {
  const checkup = new Interaction({
    date: '01/06/2024',
    time: '10:00',
    kind: InteractionKind.APPOINTMENT,
    description: 'Checkup',
    agent: 'Luigi',
    outcome: 'Booked',
  });

  it('should prefix the line with the owner tax code', () => {
    expect(InteractionLineMapper.toLine('RSSANN80A01H501Z', checkup)).toBe(
      'RSSANN80A01H501Z|01/06/2024|10:00|Appointment|Checkup|Luigi|Booked',
    );
  });

  it('should read the owner tax code and the interaction', () => {
    const { taxCode, interaction } = InteractionLineMapper.toDomain(
      'RSSANN80A01H501Z|01/06/2024|10:00|Email|Sent quote|Luigi|Waiting',
    );

    expect(taxCode).toBe('RSSANN80A01H501Z');
    expect(interaction.date).toBe('01/06/2024');
    expect(interaction.time).toBe('10:00');
    expect(interaction.kind).toBe(InteractionKind.EMAIL);
    expect(interaction.description).toBe('Sent quote');
    expect(interaction.agent).toBe('Luigi');
    expect(interaction.outcome).toBe('Waiting');
  });

  it('should decode an unknown kind as Other', () => {
    const { interaction } = InteractionLineMapper.toDomain(
      'CODE1|01/06/2024|10:00|Appuntamento|x|y|z',
    );

    expect(interaction.kind).toBe(InteractionKind.OTHER);
  });

  it('should reject lines without exactly seven fields', () => {
    expect(() =>
      InteractionLineMapper.toDomain('CODE1|01/06/2024|10:00|Call'),
    ).toThrow('Malformed interaction record: expected 7 fields, got 4');
  });
});
