import { Injectable, Inject } from '@nestjs/common';
import { CustomerStore } from '../interfaces/customer-store.interface';
import { Customer } from '../../domain/entities/customer.entity';
import { CustomerNotFoundException } from '../../domain/exceptions/customer-not-found.exception';
import { INJECTION_TOKENS } from '../../../shared/constants/injection-tokens';

@Injectable()
export class GetCustomerUseCase {
  constructor(
    @Inject(INJECTION_TOKENS.CUSTOMER_STORE)
    private readonly store: CustomerStore,
  ) {}

  async execute(id: string): Promise<Customer> {
    const customer = await this.store.findById(id, true);
    if (!customer) {
      throw new CustomerNotFoundException(id);
    }
    return customer;
  }
}
