import {
  Controller,
  Get,
  Post,
  Put,
  Delete,
  Param,
  Query,
  Body,
  Headers,
  HttpCode,
  HttpStatus,
  ParseUUIDPipe,
  UseInterceptors,
} from '@nestjs/common';
import {
  ApiTags,
  ApiOperation,
  ApiResponse,
  ApiParam,
  ApiHeader,
} from '@nestjs/swagger';
import { ListCustomersUseCase } from '../../application/use-cases/list-customers.use-case';
import { GetCustomerUseCase } from '../../application/use-cases/get-customer.use-case';
import { CreateCustomerUseCase } from '../../application/use-cases/create-customer.use-case';
import { UpdateCustomerUseCase } from '../../application/use-cases/update-customer.use-case';
import { DeleteCustomerUseCase } from '../../application/use-cases/delete-customer.use-case';
import { BulkCreateCustomersUseCase } from '../../application/use-cases/bulk-create-customers.use-case';
import { ListCustomersQueryDto } from '../dto/request/list-customers.query.dto';
import { CreateCustomerRequestDto } from '../dto/request/create-customer.request.dto';
import { UpdateCustomerRequestDto } from '../dto/request/update-customer.request.dto';
import { BulkCreateRequestDto } from '../dto/request/bulk-create.request.dto';
import {
  CustomerResponseDto,
  PaginatedCustomersResponseDto,
} from '../dto/response/customer.response.dto';
import { BulkCreateResponseDto } from '../dto/response/bulk-create.response.dto';
import { ApiErrorDto } from '../dto/response/api-response.dto';
import { CustomerResponseMapper } from '../mappers/customer-response.mapper';
import { ResponseWrapperInterceptor } from '../../../shared/interceptors/response-wrapper.interceptor';

const ACTOR_HEADER = 'x-actor';

@ApiTags('customers')
@ApiHeader({
  name: ACTOR_HEADER,
  required: false,
  description: 'Recorded as createdBy/updatedBy on writes',
})
@Controller('api/customers')
@UseInterceptors(ResponseWrapperInterceptor)
export class CustomerController {
  constructor(
    private readonly listCustomers: ListCustomersUseCase,
    private readonly getCustomer: GetCustomerUseCase,
    private readonly createCustomer: CreateCustomerUseCase,
    private readonly updateCustomer: UpdateCustomerUseCase,
    private readonly deleteCustomer: DeleteCustomerUseCase,
    private readonly bulkCreateCustomers: BulkCreateCustomersUseCase,
  ) {}

  @Get()
  @ApiOperation({
    summary: 'Search customers',
    description:
      'Filters active customers by search term, exact email and creation date range, then sorts and paginates. Without sortBy and sortOrder the newest customers come first.',
  })
  @ApiResponse({
    status: 200,
    description: 'One page of matching customers',
    type: PaginatedCustomersResponseDto,
  })
  @ApiResponse({
    status: 400,
    description: 'Invalid query parameter',
    type: ApiErrorDto,
  })
  async list(
    @Query() query: ListCustomersQueryDto,
  ): Promise<PaginatedCustomersResponseDto> {
    const page = await this.listCustomers.execute({
      skip: (query.page - 1) * query.pageSize,
      take: query.pageSize,
      searchTerm: query.search,
      emailFilter: query.email,
      dateFrom: query.dateFrom ? new Date(query.dateFrom) : null,
      dateTo: query.dateTo ? new Date(query.dateTo) : null,
      sortBy: query.sortBy,
      sortOrder: query.sortOrder,
    });
    return CustomerResponseMapper.toPage(page, query.page, query.pageSize);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get a customer by id' })
  @ApiParam({ name: 'id', description: 'Customer id (UUID)' })
  @ApiResponse({ status: 200, type: CustomerResponseDto })
  @ApiResponse({
    status: 404,
    description: 'Customer does not exist or was deleted',
    type: ApiErrorDto,
  })
  async findById(
    @Param('id', new ParseUUIDPipe()) id: string,
  ): Promise<CustomerResponseDto> {
    const customer = await this.getCustomer.execute(id);
    return CustomerResponseMapper.toResponse(customer);
  }

  @Post()
  @ApiOperation({ summary: 'Create a customer' })
  @ApiResponse({ status: 201, type: CustomerResponseDto })
  @ApiResponse({ status: 400, type: ApiErrorDto })
  @ApiResponse({
    status: 409,
    description: 'An active customer already uses this email',
    type: ApiErrorDto,
  })
  async create(
    @Body() dto: CreateCustomerRequestDto,
    @Headers(ACTOR_HEADER) actor?: string,
  ): Promise<CustomerResponseDto> {
    const customer = await this.createCustomer.execute(dto, actor ?? null);
    return CustomerResponseMapper.toResponse(customer);
  }

  @Post('bulk')
  @ApiOperation({
    summary: 'Create random customers',
    description:
      'Generates and creates 1-1000 customers. Each one succeeds or fails on its own; failures are reported per index and never undo the others.',
  })
  @ApiResponse({ status: 201, type: BulkCreateResponseDto })
  @ApiResponse({ status: 400, type: ApiErrorDto })
  async bulkCreate(
    @Body() dto: BulkCreateRequestDto,
    @Headers(ACTOR_HEADER) actor?: string,
  ): Promise<BulkCreateResponseDto> {
    const result = await this.bulkCreateCustomers.execute(
      dto.count,
      actor ?? null,
    );
    return CustomerResponseMapper.toBulkResponse(result);
  }

  @Put(':id')
  @ApiOperation({ summary: 'Replace the editable fields of a customer' })
  @ApiParam({ name: 'id', description: 'Customer id (UUID)' })
  @ApiResponse({ status: 200, type: CustomerResponseDto })
  @ApiResponse({ status: 404, type: ApiErrorDto })
  @ApiResponse({ status: 409, type: ApiErrorDto })
  async update(
    @Param('id', new ParseUUIDPipe()) id: string,
    @Body() dto: UpdateCustomerRequestDto,
    @Headers(ACTOR_HEADER) actor?: string,
  ): Promise<CustomerResponseDto> {
    const customer = await this.updateCustomer.execute(id, dto, actor ?? null);
    return CustomerResponseMapper.toResponse(customer);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Soft-delete a customer' })
  @ApiParam({ name: 'id', description: 'Customer id (UUID)' })
  @ApiResponse({ status: 204, description: 'Customer deleted' })
  @ApiResponse({ status: 404, type: ApiErrorDto })
  async remove(
    @Param('id', new ParseUUIDPipe()) id: string,
    @Headers(ACTOR_HEADER) actor?: string,
  ): Promise<void> {
    await this.deleteCustomer.execute(id, actor ?? null);
  }
}
