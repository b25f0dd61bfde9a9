import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsOptional, IsString, Matches } from 'class-validator';
import { FIELD_TEXT, FIELD_TEXT_MESSAGE } from './field-text';

/**
 * Partial update. Omitted or empty fields keep their current value, so a
 * field cannot be cleared through this request. The tax code is immutable.
 */
export class UpdateCustomerRequestDto {
  @ApiPropertyOptional({ example: 'Anna Maria' })
  @IsOptional()
  @IsString()
  @Matches(FIELD_TEXT, { message: FIELD_TEXT_MESSAGE })
  firstName?: string;

  @ApiPropertyOptional({ example: 'Rossi' })
  @IsOptional()
  @IsString()
  @Matches(FIELD_TEXT, { message: FIELD_TEXT_MESSAGE })
  lastName?: string;

  @ApiPropertyOptional({ example: 'anna.rossi@example.it' })
  @IsOptional()
  @IsString()
  @Matches(FIELD_TEXT, { message: FIELD_TEXT_MESSAGE })
  email?: string;

  @ApiPropertyOptional({ example: '+39 06 7654321' })
  @IsOptional()
  @IsString()
  @Matches(FIELD_TEXT, { message: FIELD_TEXT_MESSAGE })
  phone?: string;

  @ApiPropertyOptional({ example: 'Via Milano 2, Roma' })
  @IsOptional()
  @IsString()
  @Matches(FIELD_TEXT, { message: FIELD_TEXT_MESSAGE })
  address?: string;

  @ApiPropertyOptional({ example: '01/01/1980' })
  @IsOptional()
  @IsString()
  @Matches(FIELD_TEXT, { message: FIELD_TEXT_MESSAGE })
  birthDate?: string;
}
