export class DuplicateCustomerException extends Error {
  constructor(readonly taxCode: string) {
    super(`Customer with tax code '${taxCode}' already exists`);
    this.name = 'DuplicateCustomerException';
  }
}
