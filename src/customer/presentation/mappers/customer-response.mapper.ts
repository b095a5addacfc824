import { Customer } from '../../domain/entities/customer.entity';
import { CustomerPage } from '../../application/interfaces/customer-store.interface';
import { BulkCreateResult } from '../../application/use-cases/bulk-create-customers.use-case';
import {
  CustomerResponseDto,
  PaginatedCustomersResponseDto,
} from '../dto/response/customer.response.dto';
import { BulkCreateResponseDto } from '../dto/response/bulk-create.response.dto';

export class CustomerResponseMapper {
  static toResponse(customer: Customer): CustomerResponseDto {
    return {
      id: customer.id,
      name: customer.name,
      email: customer.email,
      phone: customer.phone,
      address: customer.address,
      createdAt: customer.createdAt.toISOString(),
      updatedAt: customer.updatedAt.toISOString(),
    };
  }

  static toPage(
    page: CustomerPage,
    pageNumber: number,
    pageSize: number,
  ): PaginatedCustomersResponseDto {
    return {
      items: page.items.map((c) => CustomerResponseMapper.toResponse(c)),
      totalCount: page.totalCount,
      page: pageNumber,
      pageSize,
      totalPages: Math.ceil(page.totalCount / pageSize),
    };
  }

  static toBulkResponse(result: BulkCreateResult): BulkCreateResponseDto {
    return {
      successCount: result.successCount,
      failureCount: result.failureCount,
      createdCustomers: result.createdCustomers.map((c) =>
        CustomerResponseMapper.toResponse(c),
      ),
      errors: result.errors,
    };
  }
}
