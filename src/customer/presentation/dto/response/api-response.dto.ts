import { ApiProperty } from '@nestjs/swagger';

export class ApiResponseDto<T> {
  @ApiProperty({ example: true })
  success!: boolean;

  @ApiProperty()
  data!: T;

  @ApiProperty({ example: '2024-06-01T10:00:00.000Z' })
  timestamp!: string;
}

export class ErrorDetailDto {
  @ApiProperty({ example: 'date' })
  field!: string;

  @ApiProperty({
    example: { validation: 'date must be in DD/MM/YYYY format' },
  })
  constraints!: Record<string, string>;
}

export class ErrorBodyDto {
  @ApiProperty({ example: 404 })
  statusCode!: number;

  @ApiProperty({ example: 'Customer not found' })
  message!: string;

  @ApiProperty({ type: [ErrorDetailDto], example: [] })
  details!: ErrorDetailDto[];
}

export class ApiErrorDto {
  @ApiProperty({ example: false })
  success!: boolean;

  @ApiProperty({ type: ErrorBodyDto })
  error!: ErrorBodyDto;

  @ApiProperty({ example: '2024-06-01T10:00:00.000Z' })
  timestamp!: string;
}
