export class InteractionNotFoundException extends Error {
  constructor(
    readonly taxCode: string,
    readonly position: number,
  ) {
    super(
      `Interaction at position ${position} not found for customer '${taxCode}'`,
    );
    this.name = 'InteractionNotFoundException';
  }
}
