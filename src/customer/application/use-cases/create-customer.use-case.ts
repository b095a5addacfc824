import { Injectable, Inject, Logger } from '@nestjs/common';
import { CustomerStore } from '../interfaces/customer-store.interface';
import { EmailUniquenessService } from '../services/email-uniqueness.service';
import { Customer } from '../../domain/entities/customer.entity';
import {
  CustomerDetails,
  CustomerDraft,
} from '../../domain/value-objects/customer-details.vo';
import { INJECTION_TOKENS } from '../../../shared/constants/injection-tokens';

@Injectable()
export class CreateCustomerUseCase {
  private readonly logger = new Logger(CreateCustomerUseCase.name);

  constructor(
    @Inject(INJECTION_TOKENS.CUSTOMER_STORE)
    private readonly store: CustomerStore,
    private readonly emailUniqueness: EmailUniquenessService,
  ) {}

  async execute(
    draft: CustomerDraft,
    actor: string | null = null,
  ): Promise<Customer> {
    const details = new CustomerDetails(draft);
    await this.emailUniqueness.assertAvailable(details.email);

    const created = await this.store.insert(
      Customer.create(details, new Date(), actor),
    );
    this.logger.debug(`Created customer ${created.id}`);
    return created;
  }
}
