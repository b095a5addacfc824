import { Injectable, Inject } from '@nestjs/common';
import { CustomerStore } from '../interfaces/customer-store.interface';
import { INJECTION_TOKENS } from '../../../shared/constants/injection-tokens';

export interface HealthStatus {
  database: boolean;
}

@Injectable()
export class CheckHealthUseCase {
  constructor(
    @Inject(INJECTION_TOKENS.CUSTOMER_STORE)
    private readonly store: CustomerStore,
  ) {}

  async execute(): Promise<HealthStatus> {
    return { database: await this.store.isHealthy() };
  }
}
