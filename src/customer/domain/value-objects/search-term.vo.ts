export class SearchTerm {
  readonly value: string;
  private readonly folded: string;

  constructor(term: string) {
    this.value = term;
    this.folded = term.toLowerCase();
  }

  /** Case-insensitive substring test. */
  foundIn(field: string): boolean {
    return field.toLowerCase().includes(this.folded);
  }

  /** Case-sensitive substring test, used for codes, dates and times. */
  foundVerbatimIn(field: string): boolean {
    return field.includes(this.value);
  }
}
