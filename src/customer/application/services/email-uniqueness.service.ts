import { Inject, Injectable, Logger } from '@nestjs/common';
import { CustomerStore } from '../interfaces/customer-store.interface';
import { CustomerEmailConflictException } from '../../domain/exceptions/customer-email-conflict.exception';
import { INJECTION_TOKENS } from '../../../shared/constants/injection-tokens';

/**
 * Write-time check that no other active customer holds an email. The
 * store's unique index still has the last word when two writers race
 * past this check.
 */
@Injectable()
export class EmailUniquenessService {
  private readonly logger = new Logger(EmailUniquenessService.name);

  constructor(
    @Inject(INJECTION_TOKENS.CUSTOMER_STORE)
    private readonly store: CustomerStore,
  ) {}

  async assertAvailable(email: string, exceptId?: string): Promise<void> {
    const holder = await this.store.findByEmail(email, true);
    if (holder && holder.id !== exceptId) {
      this.logger.debug(`Email ${email} is held by customer ${holder.id}`);
      throw new CustomerEmailConflictException(email);
    }
  }
}
