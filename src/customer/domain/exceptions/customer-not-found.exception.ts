export class CustomerNotFoundException extends Error {
  constructor(readonly taxCode: string) {
    super(`Customer with tax code '${taxCode}' not found`);
    this.name = 'CustomerNotFoundException';
  }
}
