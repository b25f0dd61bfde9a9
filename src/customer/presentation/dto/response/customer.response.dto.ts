import { ApiProperty } from '@nestjs/swagger';
import { InteractionResponseDto } from './interaction.response.dto';

export class CustomerResponseDto {
  @ApiProperty({ example: 0, description: 'Position in the store' })
  position!: number;

  @ApiProperty({ example: 'RSSANN80A01H501Z' })
  taxCode!: string;

  @ApiProperty({ example: 'Anna' })
  firstName!: string;

  @ApiProperty({ example: 'Rossi' })
  lastName!: string;

  @ApiProperty({ example: 'Anna Rossi' })
  fullName!: string;

  @ApiProperty({ example: 'anna.rossi@example.it' })
  email!: string;

  @ApiProperty({ example: '+39 06 1234567' })
  phone!: string;

  @ApiProperty({ example: 'Via Roma 1, Roma' })
  address!: string;

  @ApiProperty({ example: '01/01/1980' })
  birthDate!: string;

  @ApiProperty({ example: 1 })
  interactionCount!: number;
}

export class CustomerDetailResponseDto extends CustomerResponseDto {
  @ApiProperty({ type: [InteractionResponseDto] })
  interactions!: InteractionResponseDto[];
}
