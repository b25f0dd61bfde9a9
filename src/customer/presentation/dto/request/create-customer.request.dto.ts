import { IsNotEmpty, IsOptional, IsString, Matches } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { FIELD_TEXT, FIELD_TEXT_MESSAGE } from './field-text';

export class CreateCustomerRequestDto {
  @ApiProperty({ example: 'RSSANN80A01H501Z' })
  @IsString()
  @IsNotEmpty()
  @Matches(FIELD_TEXT, { message: FIELD_TEXT_MESSAGE })
  taxCode!: string;

  @ApiPropertyOptional({ example: 'Anna' })
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

  @ApiPropertyOptional({ example: '+39 06 1234567' })
  @IsOptional()
  @IsString()
  @Matches(FIELD_TEXT, { message: FIELD_TEXT_MESSAGE })
  phone?: string;

  @ApiPropertyOptional({ example: 'Via Roma 1, Roma' })
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
