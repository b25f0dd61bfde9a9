/**
 * Raised by the line mappers when a line does not split into the expected
 * number of fields. The loader skips the offending line and carries on.
 */
export class MalformedRecordException extends Error {
  constructor(
    readonly record: 'customer' | 'interaction',
    readonly fieldCount: number,
    readonly expected: number,
  ) {
    super(
      `Malformed ${record} record: expected ${expected} fields, got ${fieldCount}`,
    );
    this.name = 'MalformedRecordException';
  }
}
