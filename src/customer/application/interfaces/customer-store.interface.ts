import { Customer } from '../../domain/entities/customer.entity';
import { CustomerFilter } from '../../domain/query/customer-filter';
import { CustomerSort } from '../../domain/query/customer-sort';

export interface CustomerPage {
  items: Customer[];
  /** Records matching the filter, ignoring skip/take. */
  totalCount: number;
}

/**
 * Durable storage for customer records and the final authority on email
 * uniqueness among active records.
 *
 * Abstract class rather than interface so it can double as a DI type.
 */
export abstract class CustomerStore {
  /** Rejects with `CustomerEmailConflictException` on a duplicate active email. */
  abstract insert(customer: Customer): Promise<Customer>;

  /**
   * Rejects with `CustomerNotFoundException` when the id is unknown and
   * with `CustomerEmailConflictException` on a duplicate active email.
   */
  abstract update(customer: Customer): Promise<Customer>;

  abstract findById(id: string, activeOnly: boolean): Promise<Customer | null>;
  abstract findByEmail(
    email: string,
    activeOnly: boolean,
  ): Promise<Customer | null>;

  abstract query(
    filter: CustomerFilter,
    sort: CustomerSort,
    skip: number,
    take: number,
  ): Promise<CustomerPage>;

  abstract count(): Promise<number>;
  abstract isHealthy(): Promise<boolean>;
}
