import { ApiProperty } from '@nestjs/swagger';

export class ErrorDetailDto {
  @ApiProperty({ example: 'email' })
  field!: string;

  @ApiProperty({ example: { validation: 'Invalid email format' } })
  constraints!: Record<string, string>;
}

export class ErrorBodyDto {
  @ApiProperty({ example: 404 })
  statusCode!: number;

  @ApiProperty({ example: "Customer with id '3f0c5a52-…' not found" })
  message!: string;

  @ApiProperty({ type: [ErrorDetailDto], example: [] })
  details!: ErrorDetailDto[];
}

export class ApiErrorDto {
  @ApiProperty({ example: false })
  success!: boolean;

  @ApiProperty({ type: ErrorBodyDto })
  error!: ErrorBodyDto;

  @ApiProperty({ example: '2026-02-22T10:00:00.000Z' })
  timestamp!: string;
}
