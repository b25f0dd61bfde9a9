export class PersistenceException extends Error {
  constructor(
    readonly path: string,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Cannot write data file '${path}': ${reason}`, { cause });
    this.name = 'PersistenceException';
  }
}
