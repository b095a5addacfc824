import { IsInt, Max, Min } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';

export class BulkCreateRequestDto {
  @ApiProperty({
    description: 'Number of random customers to create',
    example: 25,
    minimum: 1,
    maximum: 1000,
  })
  @IsInt()
  @Min(1, { message: 'Count must be between 1 and 1000' })
  @Max(1000, { message: 'Count must be between 1 and 1000' })
  count!: number;
}
