import { Injectable, Inject, Logger } from '@nestjs/common';
import { CustomerGenerator } from '../interfaces/customer-generator.interface';
import { CreateCustomerUseCase } from './create-customer.use-case';
import { Customer } from '../../domain/entities/customer.entity';
import { CustomerDraft } from '../../domain/value-objects/customer-details.vo';
import { CustomerEmailConflictException } from '../../domain/exceptions/customer-email-conflict.exception';
import { CustomerValidationException } from '../../domain/exceptions/customer-validation.exception';
import { INJECTION_TOKENS } from '../../../shared/constants/injection-tokens';

export const MAX_BULK_CREATE_COUNT = 1000;

export type BulkCreateOutcome =
  | { ok: true; index: number; customer: Customer }
  | { ok: false; index: number; message: string };

export interface BulkCreateError {
  index: number;
  message: string;
}

export interface BulkCreateResult {
  successCount: number;
  failureCount: number;
  createdCustomers: Customer[];
  errors: BulkCreateError[];
}

export function summarizeBulkCreate(
  outcomes: BulkCreateOutcome[],
): BulkCreateResult {
  const createdCustomers: Customer[] = [];
  const errors: BulkCreateError[] = [];

  for (const outcome of outcomes) {
    if (outcome.ok) {
      createdCustomers.push(outcome.customer);
    } else {
      errors.push({ index: outcome.index, message: outcome.message });
    }
  }

  return {
    successCount: createdCustomers.length,
    failureCount: errors.length,
    createdCustomers,
    errors,
  };
}

/**
 * Creates `count` generated customers one after another through the
 * regular create path. A rejected candidate becomes an error entry and
 * the batch moves on; nothing already created is rolled back. Storage
 * failures are not per-item outcomes and fail the whole call.
 */
@Injectable()
export class BulkCreateCustomersUseCase {
  private readonly logger = new Logger(BulkCreateCustomersUseCase.name);

  constructor(
    @Inject(INJECTION_TOKENS.CUSTOMER_GENERATOR)
    private readonly generator: CustomerGenerator,
    private readonly createCustomer: CreateCustomerUseCase,
  ) {}

  async execute(
    count: number,
    actor: string | null = null,
  ): Promise<BulkCreateResult> {
    if (
      !Number.isInteger(count) ||
      count < 1 ||
      count > MAX_BULK_CREATE_COUNT
    ) {
      throw new CustomerValidationException([
        {
          field: 'count',
          message: `Count must be between 1 and ${MAX_BULK_CREATE_COUNT}`,
        },
      ]);
    }

    const drafts = this.generator.generate(count);
    if (drafts.length !== count) {
      throw new Error(
        `Customer generator returned ${drafts.length} candidates, expected ${count}`,
      );
    }

    const outcomes: BulkCreateOutcome[] = [];
    for (const [index, draft] of drafts.entries()) {
      outcomes.push(await this.attempt(index, draft, actor));
    }

    const result = summarizeBulkCreate(outcomes);
    this.logger.log(
      `Bulk create finished: ${result.successCount} created, ${result.failureCount} failed`,
    );
    return result;
  }

  private async attempt(
    index: number,
    draft: CustomerDraft,
    actor: string | null,
  ): Promise<BulkCreateOutcome> {
    try {
      const customer = await this.createCustomer.execute(draft, actor);
      return { ok: true, index, customer };
    } catch (error: unknown) {
      if (
        error instanceof CustomerValidationException ||
        error instanceof CustomerEmailConflictException
      ) {
        this.logger.warn(`Bulk create item ${index} rejected: ${error.message}`);
        return { ok: false, index, message: error.message };
      }
      throw error;
    }
  }
}
