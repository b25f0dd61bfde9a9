import {
  Controller,
  Get,
  Post,
  Patch,
  Delete,
  Param,
  ParseIntPipe,
  Query,
  Body,
  NotFoundException,
  UseInterceptors,
} from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse, ApiParam } from '@nestjs/swagger';
import { GetCustomerUseCase } from '../../application/use-cases/get-customer.use-case';
import { RegisterCustomerUseCase } from '../../application/use-cases/register-customer.use-case';
import { UpdateCustomerUseCase } from '../../application/use-cases/update-customer.use-case';
import { RemoveCustomerUseCase } from '../../application/use-cases/remove-customer.use-case';
import { RecordInteractionUseCase } from '../../application/use-cases/record-interaction.use-case';
import { RemoveInteractionUseCase } from '../../application/use-cases/remove-interaction.use-case';
import { SearchCustomersUseCase } from '../../application/use-cases/search-customers.use-case';
import { CreateCustomerRequestDto } from '../dto/request/create-customer.request.dto';
import { UpdateCustomerRequestDto } from '../dto/request/update-customer.request.dto';
import { CreateInteractionRequestDto } from '../dto/request/create-interaction.request.dto';
import { SearchQueryRequestDto } from '../dto/request/search-query.request.dto';
import { NameLookupRequestDto } from '../dto/request/name-lookup.request.dto';
import {
  CustomerDetailResponseDto,
  CustomerResponseDto,
} from '../dto/response/customer.response.dto';
import { InteractionResponseDto } from '../dto/response/interaction.response.dto';
import { ApiErrorDto } from '../dto/response/api-response.dto';
import { CustomerResponseMapper } from '../mappers/customer-response.mapper';
import { ResponseWrapperInterceptor } from '../../../shared/interceptors/response-wrapper.interceptor';

@ApiTags('customers')
@Controller('customers')
@UseInterceptors(ResponseWrapperInterceptor)
export class CustomerController {
  constructor(
    private readonly getCustomer: GetCustomerUseCase,
    private readonly registerCustomer: RegisterCustomerUseCase,
    private readonly updateCustomer: UpdateCustomerUseCase,
    private readonly removeCustomer: RemoveCustomerUseCase,
    private readonly recordInteraction: RecordInteractionUseCase,
    private readonly removeInteraction: RemoveInteractionUseCase,
    private readonly searchCustomers: SearchCustomersUseCase,
  ) {}

  @Get()
  @ApiOperation({ summary: 'List all customers in store order' })
  @ApiResponse({ status: 200, type: [CustomerResponseDto] })
  list(): CustomerResponseDto[] {
    return this.getCustomer
      .list()
      .map(({ customer, position }) =>
        CustomerResponseMapper.toSummary(customer, position),
      );
  }

  @Post()
  @ApiOperation({ summary: 'Register a new customer' })
  @ApiResponse({ status: 201, type: CustomerDetailResponseDto })
  @ApiResponse({
    status: 409,
    description: 'Tax code already registered',
    type: ApiErrorDto,
  })
  create(@Body() dto: CreateCustomerRequestDto): CustomerDetailResponseDto {
    const customer = this.registerCustomer.execute(dto);
    const { position } = this.getCustomer.byTaxCode(customer.taxCode);
    return CustomerResponseMapper.toDetail(customer, position);
  }

  @Get('search')
  @ApiOperation({
    summary: 'Search customers',
    description:
      'Partial match on first name, last name, email and phone (case-insensitive) and on tax code (case-sensitive).',
  })
  @ApiResponse({ status: 200, type: [CustomerResponseDto] })
  search(@Query() query: SearchQueryRequestDto): CustomerResponseDto[] {
    return this.searchCustomers
      .execute(query.q)
      .map(({ customer, position }) =>
        CustomerResponseMapper.toSummary(customer, position),
      );
  }

  @Get('lookup')
  @ApiOperation({ summary: 'Find the first customer with an exact name' })
  @ApiResponse({ status: 200, type: CustomerDetailResponseDto })
  @ApiResponse({ status: 404, type: ApiErrorDto })
  lookup(@Query() query: NameLookupRequestDto): CustomerDetailResponseDto {
    const found = this.getCustomer.byName(query.firstName, query.lastName);
    if (!found) {
      throw new NotFoundException(
        `Customer named '${query.firstName} ${query.lastName}' not found`,
      );
    }
    return CustomerResponseMapper.toDetail(found.customer, found.position);
  }

  @Get(':taxCode')
  @ApiOperation({ summary: 'Get a customer and its interactions' })
  @ApiParam({ name: 'taxCode', example: 'RSSANN80A01H501Z' })
  @ApiResponse({ status: 200, type: CustomerDetailResponseDto })
  @ApiResponse({ status: 404, type: ApiErrorDto })
  findOne(@Param('taxCode') taxCode: string): CustomerDetailResponseDto {
    const { customer, position } = this.getCustomer.byTaxCode(taxCode);
    return CustomerResponseMapper.toDetail(customer, position);
  }

  @Patch(':taxCode')
  @ApiOperation({
    summary: 'Update customer fields',
    description: 'Only non-empty fields are applied.',
  })
  @ApiParam({ name: 'taxCode', example: 'RSSANN80A01H501Z' })
  @ApiResponse({ status: 200, type: CustomerDetailResponseDto })
  @ApiResponse({ status: 404, type: ApiErrorDto })
  update(
    @Param('taxCode') taxCode: string,
    @Body() dto: UpdateCustomerRequestDto,
  ): CustomerDetailResponseDto {
    this.updateCustomer.execute(taxCode, dto);
    const { customer, position } = this.getCustomer.byTaxCode(taxCode);
    return CustomerResponseMapper.toDetail(customer, position);
  }

  @Delete(':taxCode')
  @ApiOperation({ summary: 'Remove a customer and all its interactions' })
  @ApiParam({ name: 'taxCode', example: 'RSSANN80A01H501Z' })
  @ApiResponse({ status: 200, type: CustomerDetailResponseDto })
  @ApiResponse({ status: 404, type: ApiErrorDto })
  remove(@Param('taxCode') taxCode: string): CustomerDetailResponseDto {
    const { position } = this.getCustomer.byTaxCode(taxCode);
    const removed = this.removeCustomer.execute(taxCode);
    return CustomerResponseMapper.toDetail(removed, position);
  }

  @Get(':taxCode/interactions')
  @ApiOperation({ summary: 'List the interactions of a customer' })
  @ApiParam({ name: 'taxCode', example: 'RSSANN80A01H501Z' })
  @ApiResponse({ status: 200, type: [InteractionResponseDto] })
  @ApiResponse({ status: 404, type: ApiErrorDto })
  interactions(@Param('taxCode') taxCode: string): InteractionResponseDto[] {
    const { customer } = this.getCustomer.byTaxCode(taxCode);
    return CustomerResponseMapper.toInteractions(customer);
  }

  @Post(':taxCode/interactions')
  @ApiOperation({ summary: 'Record an interaction with a customer' })
  @ApiParam({ name: 'taxCode', example: 'RSSANN80A01H501Z' })
  @ApiResponse({ status: 201, type: InteractionResponseDto })
  @ApiResponse({ status: 400, type: ApiErrorDto })
  @ApiResponse({ status: 404, type: ApiErrorDto })
  addInteraction(
    @Param('taxCode') taxCode: string,
    @Body() dto: CreateInteractionRequestDto,
  ): InteractionResponseDto {
    const { interaction, position } = this.recordInteraction.execute(
      taxCode,
      dto,
    );
    return CustomerResponseMapper.toInteraction(interaction, position);
  }

  @Delete(':taxCode/interactions/:position')
  @ApiOperation({
    summary: 'Remove an interaction by position',
    description: 'Later interactions move down by one position.',
  })
  @ApiParam({ name: 'taxCode', example: 'RSSANN80A01H501Z' })
  @ApiParam({ name: 'position', example: 0 })
  @ApiResponse({ status: 200, type: InteractionResponseDto })
  @ApiResponse({ status: 404, type: ApiErrorDto })
  deleteInteraction(
    @Param('taxCode') taxCode: string,
    @Param('position', ParseIntPipe) position: number,
  ): InteractionResponseDto {
    const removed = this.removeInteraction.execute(taxCode, position);
    return CustomerResponseMapper.toInteraction(removed, position);
  }
}
