import { Customer } from '../../../domain/entities/customer.entity';
import { MalformedRecordException } from '../../../domain/exceptions/malformed-record.exception';
import { joinFields, splitFields } from './line-format';

const CUSTOMER_FIELD_COUNT = 7;

/**
 * Customer file line:
 * `firstName|lastName|email|phone|address|taxCode|birthDate`
 */
export class CustomerLineMapper {
  static toDomain(line: string): Customer {
    const fields = splitFields(line);
    if (fields.length !== CUSTOMER_FIELD_COUNT) {
      throw new MalformedRecordException(
        'customer',
        fields.length,
        CUSTOMER_FIELD_COUNT,
      );
    }

    const [firstName, lastName, email, phone, address, taxCode, birthDate] =
      fields;
    return new Customer({
      firstName,
      lastName,
      email,
      phone,
      address,
      taxCode,
      birthDate,
    });
  }

  static toLine(customer: Customer): string {
    return joinFields([
      customer.firstName,
      customer.lastName,
      customer.email,
      customer.phone,
      customer.address,
      customer.taxCode,
      customer.birthDate,
    ]);
  }
}
