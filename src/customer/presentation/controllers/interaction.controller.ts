import { Controller, Get, Query, UseInterceptors } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { SearchInteractionsUseCase } from '../../application/use-cases/search-interactions.use-case';
import { SearchQueryRequestDto } from '../dto/request/search-query.request.dto';
import { InteractionMatchResponseDto } from '../dto/response/interaction.response.dto';
import { CustomerResponseMapper } from '../mappers/customer-response.mapper';
import { ResponseWrapperInterceptor } from '../../../shared/interceptors/response-wrapper.interceptor';

@ApiTags('interactions')
@Controller('interactions')
@UseInterceptors(ResponseWrapperInterceptor)
export class InteractionController {
  constructor(private readonly searchInteractions: SearchInteractionsUseCase) {}

  @Get('search')
  @ApiOperation({
    summary: 'Search interactions across all customers',
    description:
      'Partial match on description, agent, outcome and kind (case-insensitive) and on date and time (case-sensitive).',
  })
  @ApiResponse({ status: 200, type: [InteractionMatchResponseDto] })
  search(@Query() query: SearchQueryRequestDto): InteractionMatchResponseDto[] {
    return this.searchInteractions
      .execute(query.q)
      .map((match) => CustomerResponseMapper.toInteractionMatch(match));
  }
}
