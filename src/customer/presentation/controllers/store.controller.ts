import {
  Controller,
  HttpCode,
  HttpStatus,
  Post,
  UseInterceptors,
} from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { PersistCustomersUseCase } from '../../application/use-cases/persist-customers.use-case';
import {
  LoadResultResponseDto,
  SaveResultResponseDto,
} from '../dto/response/store.response.dto';
import { ApiErrorDto } from '../dto/response/api-response.dto';
import { ResponseWrapperInterceptor } from '../../../shared/interceptors/response-wrapper.interceptor';

@ApiTags('store')
@Controller('store')
@UseInterceptors(ResponseWrapperInterceptor)
export class StoreController {
  constructor(private readonly persistence: PersistCustomersUseCase) {}

  @Post('save')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Write all customers and interactions to disk' })
  @ApiResponse({ status: 200, type: SaveResultResponseDto })
  @ApiResponse({
    status: 500,
    description: 'A data file could not be written',
    type: ApiErrorDto,
  })
  save(): Promise<SaveResultResponseDto> {
    return this.persistence.save();
  }

  @Post('load')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Replace the in-memory store with the saved files',
    description:
      'Reports loaded=false and keeps the current data when either file cannot be read.',
  })
  @ApiResponse({ status: 200, type: LoadResultResponseDto })
  load(): Promise<LoadResultResponseDto> {
    return this.persistence.load();
  }
}
