import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class CustomerResponseDto {
  @ApiProperty({ example: '3f0c5a52-8d0e-4c36-9a57-1f1b7c0f4a11' })
  id!: string;

  @ApiProperty({ example: 'John Smith' })
  name!: string;

  @ApiProperty({ example: 'john.smith@example.com' })
  email!: string;

  @ApiPropertyOptional({ example: '+1-555-0101', nullable: true })
  phone!: string | null;

  @ApiPropertyOptional({
    example: '123 Main St, New York, NY 10001, USA',
    nullable: true,
  })
  address!: string | null;

  @ApiProperty({ example: '2026-01-15T22:29:32.000Z' })
  createdAt!: string;

  @ApiProperty({ example: '2026-01-15T22:29:32.000Z' })
  updatedAt!: string;
}

export class PaginatedCustomersResponseDto {
  @ApiProperty({ type: [CustomerResponseDto] })
  items!: CustomerResponseDto[];

  @ApiProperty({ example: 42 })
  totalCount!: number;

  @ApiProperty({ example: 1 })
  page!: number;

  @ApiProperty({ example: 10 })
  pageSize!: number;

  @ApiProperty({ example: 5 })
  totalPages!: number;
}
