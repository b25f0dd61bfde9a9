import { IsString, MinLength } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';

export class SearchQueryRequestDto {
  @ApiProperty({
    description: 'Search term (partial match, case-insensitive)',
    example: 'rossi',
    minLength: 1,
  })
  @IsString()
  @MinLength(1)
  q!: string;
}
