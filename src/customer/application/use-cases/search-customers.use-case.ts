import { Injectable } from '@nestjs/common';
import {
  CustomerMatch,
  CustomerQueryService,
} from '../services/customer-query.service';

@Injectable()
export class SearchCustomersUseCase {
  constructor(private readonly queryService: CustomerQueryService) {}

  execute(query: string): CustomerMatch[] {
    return [...this.queryService.searchCustomers(query)];
  }
}
