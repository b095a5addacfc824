import { Injectable, Inject, Logger } from '@nestjs/common';
import { CustomerStore } from '../interfaces/customer-store.interface';
import { Customer } from '../../domain/entities/customer.entity';
import { CustomerNotFoundException } from '../../domain/exceptions/customer-not-found.exception';
import { INJECTION_TOKENS } from '../../../shared/constants/injection-tokens';

/**
 * Soft delete: the row stays, flagged, and drops out of every read and of
 * the email uniqueness check. A second delete of the same id is a 404.
 */
@Injectable()
export class DeleteCustomerUseCase {
  private readonly logger = new Logger(DeleteCustomerUseCase.name);

  constructor(
    @Inject(INJECTION_TOKENS.CUSTOMER_STORE)
    private readonly store: CustomerStore,
  ) {}

  async execute(id: string, actor: string | null = null): Promise<Customer> {
    const existing = await this.store.findById(id, true);
    if (!existing) {
      throw new CustomerNotFoundException(id);
    }

    const deleted = await this.store.update(
      existing.markDeleted(new Date(), actor),
    );
    this.logger.log(`Soft-deleted customer ${deleted.id}`);
    return deleted;
  }
}
