import { ApiProperty } from '@nestjs/swagger';

export class SaveResultResponseDto {
  @ApiProperty({ example: 12 })
  customers!: number;

  @ApiProperty({ example: 40 })
  interactions!: number;
}

export class LoadResultResponseDto {
  @ApiProperty({
    example: true,
    description: 'False when the data files could not be read',
  })
  loaded!: boolean;

  @ApiProperty({ example: 12 })
  customers!: number;
}
