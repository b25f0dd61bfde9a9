import { Interaction } from './interaction.entity';
import { SearchTerm } from '../value-objects/search-term.vo';

export type CustomerParams = {
  firstName?: string;
  lastName?: string;
  email?: string;
  phone?: string;
  address?: string;
  taxCode?: string;
  birthDate?: string;
};

export class Customer {
  firstName: string;
  lastName: string;
  email: string;
  phone: string;
  address: string;
  readonly taxCode: string;
  birthDate: string;
  private readonly _interactions: Interaction[] = [];

  constructor(params: CustomerParams = {}) {
    this.firstName = params.firstName ?? '';
    this.lastName = params.lastName ?? '';
    this.email = params.email ?? '';
    this.phone = params.phone ?? '';
    this.address = params.address ?? '';
    this.taxCode = params.taxCode ?? '';
    this.birthDate = params.birthDate ?? '';
  }

  get fullName(): string {
    return `${this.firstName} ${this.lastName}`;
  }

  get interactions(): readonly Interaction[] {
    return this._interactions;
  }

  /** Appends an interaction and returns its position. */
  addInteraction(interaction: Interaction): number {
    this._interactions.push(interaction);
    return this._interactions.length - 1;
  }

  /**
   * Removes the interaction at `position`, shifting later ones down.
   * Returns null when the position is out of range.
   */
  removeInteraction(position: number): Interaction | null {
    if (
      !Number.isInteger(position) ||
      position < 0 ||
      position >= this._interactions.length
    ) {
      return null;
    }
    const [removed] = this._interactions.splice(position, 1);
    return removed ?? null;
  }

  // Tax code is matched verbatim; the other fields ignore case.
  matches(term: string): boolean {
    const search = new SearchTerm(term);
    return (
      search.foundIn(this.firstName) ||
      search.foundIn(this.lastName) ||
      search.foundIn(this.email) ||
      search.foundIn(this.phone) ||
      search.foundVerbatimIn(this.taxCode)
    );
  }

  equals(other: Customer): boolean {
    return this.taxCode === other.taxCode;
  }
}
