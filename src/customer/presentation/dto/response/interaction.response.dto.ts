import { ApiProperty } from '@nestjs/swagger';
import { InteractionKind } from '../../../domain/enums/interaction-kind.enum';

export class InteractionResponseDto {
  @ApiProperty({ example: 0, description: 'Position in the customer list' })
  position!: number;

  @ApiProperty({ example: '01/06/2024' })
  date!: string;

  @ApiProperty({ example: '10:00' })
  time!: string;

  @ApiProperty({ enum: InteractionKind, example: InteractionKind.APPOINTMENT })
  kind!: InteractionKind;

  @ApiProperty({ example: 'Policy renewal checkup' })
  description!: string;

  @ApiProperty({ example: 'Luigi' })
  agent!: string;

  @ApiProperty({ example: 'Booked' })
  outcome!: string;
}

export class InteractionMatchResponseDto {
  @ApiProperty({ example: 0 })
  customerPosition!: number;

  @ApiProperty({ example: 'RSSANN80A01H501Z' })
  taxCode!: string;

  @ApiProperty({ example: 'Anna Rossi' })
  customerName!: string;

  @ApiProperty({ type: InteractionResponseDto })
  interaction!: InteractionResponseDto;
}
