import { InteractionKind } from '../enums/interaction-kind.enum';
import { SearchTerm } from '../value-objects/search-term.vo';

export type InteractionParams = {
  date?: string;
  time?: string;
  kind?: InteractionKind;
  description?: string;
  agent?: string;
  outcome?: string;
};

/**
 * A dated contact with a customer. Interactions have no key of their own:
 * they are addressed by position inside the owning customer's list.
 */
export class Interaction {
  readonly date: string;
  readonly time: string;
  readonly kind: InteractionKind;
  readonly description: string;
  readonly agent: string;
  readonly outcome: string;

  constructor(params: InteractionParams = {}) {
    this.date = params.date ?? '';
    this.time = params.time ?? '';
    this.kind = params.kind ?? InteractionKind.OTHER;
    this.description = params.description ?? '';
    this.agent = params.agent ?? '';
    this.outcome = params.outcome ?? '';
  }

  get kindLabel(): string {
    return this.kind;
  }

  matches(term: string): boolean {
    const search = new SearchTerm(term);
    return (
      search.foundIn(this.description) ||
      search.foundIn(this.agent) ||
      search.foundIn(this.outcome) ||
      search.foundIn(this.kindLabel) ||
      search.foundVerbatimIn(this.date) ||
      search.foundVerbatimIn(this.time)
    );
  }
}
