import { IsEnum, IsOptional, IsString, Matches } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { InteractionKind } from '../../../domain/enums/interaction-kind.enum';
import {
  DATE_FORMAT,
  FIELD_TEXT,
  FIELD_TEXT_MESSAGE,
  TIME_FORMAT,
} from './field-text';

export class CreateInteractionRequestDto {
  @ApiProperty({ example: '01/06/2024', description: 'DD/MM/YYYY' })
  @IsString()
  @Matches(DATE_FORMAT, { message: 'date must be in DD/MM/YYYY format' })
  date!: string;

  @ApiProperty({ example: '10:00', description: 'HH:MM' })
  @IsString()
  @Matches(TIME_FORMAT, { message: 'time must be in HH:MM format' })
  time!: string;

  @ApiProperty({ enum: InteractionKind, example: InteractionKind.APPOINTMENT })
  @IsEnum(InteractionKind)
  kind!: InteractionKind;

  @ApiPropertyOptional({ example: 'Policy renewal checkup' })
  @IsOptional()
  @IsString()
  @Matches(FIELD_TEXT, { message: FIELD_TEXT_MESSAGE })
  description?: string;

  @ApiPropertyOptional({ example: 'Luigi' })
  @IsOptional()
  @IsString()
  @Matches(FIELD_TEXT, { message: FIELD_TEXT_MESSAGE })
  agent?: string;

  @ApiPropertyOptional({ example: 'Booked' })
  @IsOptional()
  @IsString()
  @Matches(FIELD_TEXT, { message: FIELD_TEXT_MESSAGE })
  outcome?: string;
}
