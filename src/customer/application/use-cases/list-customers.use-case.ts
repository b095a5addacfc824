import { Injectable, Inject } from '@nestjs/common';
import {
  CustomerPage,
  CustomerStore,
} from '../interfaces/customer-store.interface';
import { buildCustomerFilter } from '../../domain/query/customer-filter';
import { resolveCustomerSort } from '../../domain/query/customer-sort';
import {
  CustomerValidationException,
  FieldViolation,
} from '../../domain/exceptions/customer-validation.exception';
import { INJECTION_TOKENS } from '../../../shared/constants/injection-tokens';
import { AppConfig } from '../../../shared/config/app.config';

export interface ListCustomersQuery {
  skip: number;
  take: number;
  searchTerm?: string | null;
  emailFilter?: string | null;
  dateFrom?: Date | null;
  dateTo?: Date | null;
  sortBy?: string | null;
  sortOrder?: string | null;
}

@Injectable()
export class ListCustomersUseCase {
  constructor(
    @Inject(INJECTION_TOKENS.CUSTOMER_STORE)
    private readonly store: CustomerStore,
    @Inject(INJECTION_TOKENS.APP_CONFIG)
    private readonly config: AppConfig,
  ) {}

  async execute(query: ListCustomersQuery): Promise<CustomerPage> {
    const { take } = query;
    if (!Number.isInteger(take) || take < 1 || take > this.config.maxPageSize) {
      throw new CustomerValidationException([
        {
          field: 'take',
          message: `Page size must be between 1 and ${this.config.maxPageSize}`,
        },
      ]);
    }
    const skip = Math.max(0, Math.floor(query.skip));
    if (!Number.isSafeInteger(skip)) {
      throw new CustomerValidationException([
        {
          field: 'skip',
          message: `Offset must be between 0 and ${Number.MAX_SAFE_INTEGER}`,
        },
      ]);
    }

    const invalidDates: FieldViolation[] = [];
    for (const [field, date] of [
      ['dateFrom', query.dateFrom],
      ['dateTo', query.dateTo],
    ] as const) {
      if (date && Number.isNaN(date.getTime())) {
        invalidDates.push({ field, message: `${field} is not a valid date` });
      }
    }
    if (invalidDates.length > 0) {
      throw new CustomerValidationException(invalidDates);
    }

    const filter = buildCustomerFilter({
      searchTerm: query.searchTerm,
      emailFilter: query.emailFilter,
      dateFrom: query.dateFrom,
      dateTo: query.dateTo,
    });
    const sort = resolveCustomerSort(query.sortBy, query.sortOrder);

    return this.store.query(filter, sort, skip, take);
  }
}
