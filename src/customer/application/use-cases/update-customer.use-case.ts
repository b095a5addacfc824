import { Injectable, Inject, Logger } from '@nestjs/common';
import { CustomerStore } from '../interfaces/customer-store.interface';
import { EmailUniquenessService } from '../services/email-uniqueness.service';
import { Customer } from '../../domain/entities/customer.entity';
import { CustomerNotFoundException } from '../../domain/exceptions/customer-not-found.exception';
import {
  CustomerDetails,
  CustomerDraft,
} from '../../domain/value-objects/customer-details.vo';
import { INJECTION_TOKENS } from '../../../shared/constants/injection-tokens';

@Injectable()
export class UpdateCustomerUseCase {
  private readonly logger = new Logger(UpdateCustomerUseCase.name);

  constructor(
    @Inject(INJECTION_TOKENS.CUSTOMER_STORE)
    private readonly store: CustomerStore,
    private readonly emailUniqueness: EmailUniquenessService,
  ) {}

  async execute(
    id: string,
    draft: CustomerDraft,
    actor: string | null = null,
  ): Promise<Customer> {
    const existing = await this.store.findById(id, true);
    if (!existing) {
      throw new CustomerNotFoundException(id);
    }

    const details = new CustomerDetails(draft);
    if (details.email !== existing.email) {
      await this.emailUniqueness.assertAvailable(details.email, existing.id);
    }

    const updated = await this.store.update(
      existing.withDetails(details, new Date(), actor),
    );
    this.logger.debug(`Updated customer ${updated.id}`);
    return updated;
  }
}
