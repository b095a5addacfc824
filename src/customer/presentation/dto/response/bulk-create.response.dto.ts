import { ApiProperty } from '@nestjs/swagger';
import { CustomerResponseDto } from './customer.response.dto';

export class BulkCreateErrorDto {
  @ApiProperty({ example: 2 })
  index!: number;

  @ApiProperty({
    example: "A customer with email 'mary.smith@example.com' already exists",
  })
  message!: string;
}

export class BulkCreateResponseDto {
  @ApiProperty({ example: 4 })
  successCount!: number;

  @ApiProperty({ example: 1 })
  failureCount!: number;

  @ApiProperty({ type: [CustomerResponseDto] })
  createdCustomers!: CustomerResponseDto[];

  @ApiProperty({ type: [BulkCreateErrorDto] })
  errors!: BulkCreateErrorDto[];
}
