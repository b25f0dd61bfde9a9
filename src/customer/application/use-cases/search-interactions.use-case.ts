import { Injectable } from '@nestjs/common';
import {
  CustomerQueryService,
  InteractionMatch,
} from '../services/customer-query.service';

@Injectable()
export class SearchInteractionsUseCase {
  constructor(private readonly queryService: CustomerQueryService) {}

  execute(query: string): InteractionMatch[] {
    return [...this.queryService.searchInteractions(query)];
  }
}
