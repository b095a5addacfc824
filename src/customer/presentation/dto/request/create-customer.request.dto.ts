import {
  IsEmail,
  IsNotEmpty,
  IsOptional,
  IsString,
  Matches,
  MaxLength,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class CreateCustomerRequestDto {
  @ApiProperty({ example: 'John Smith', maxLength: 100 })
  @IsString()
  @IsNotEmpty({ message: 'Name is required' })
  @MaxLength(100, { message: 'Name cannot exceed 100 characters' })
  name!: string;

  @ApiProperty({ example: 'john.smith@example.com', maxLength: 320 })
  @IsEmail({}, { message: 'Invalid email format' })
  @MaxLength(320)
  email!: string;

  @ApiPropertyOptional({ example: '+1-555-0101', maxLength: 20 })
  @IsOptional()
  @IsString()
  @MaxLength(20, { message: 'Phone cannot exceed 20 characters' })
  @Matches(/^[0-9+\-().\s]*$/, { message: 'Invalid phone format' })
  phone?: string;

  @ApiPropertyOptional({
    example: '123 Main St, New York, NY 10001, USA',
    maxLength: 500,
  })
  @IsOptional()
  @IsString()
  @MaxLength(500, { message: 'Address cannot exceed 500 characters' })
  address?: string;
}
