import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { CustomerStore } from '../../../application/interfaces/customer-store.interface';
import { Customer } from '../../../domain/entities/customer.entity';
import {
  CustomerDetails,
  CustomerDraft,
} from '../../../domain/value-objects/customer-details.vo';
import { INJECTION_TOKENS } from '../../../../shared/constants/injection-tokens';
import { AppConfig } from '../../../../shared/config/app.config';

const SEED_DATA: CustomerDraft[] = [
  {
    name: 'John Smith',
    email: 'john.smith@example.com',
    phone: '+1-555-0101',
    address: '123 Main St, New York, NY 10001, USA',
  },
  {
    name: 'Emma Johnson',
    email: 'emma.j@example.com',
    phone: '+1-555-0102',
    address: '456 Oak Ave, Los Angeles, CA 90001, USA',
  },
  {
    name: 'Michael Williams',
    email: 'm.williams@example.com',
    phone: '+1-555-0103',
    address: '789 Pine Rd, Chicago, IL 60601, USA',
  },
  {
    name: 'Sophia Brown',
    email: 'sophia.brown@example.com',
    phone: '+1-555-0104',
    address: '321 Elm St, Houston, TX 77001, USA',
  },
  {
    name: 'James Davis',
    email: 'james.davis@example.com',
    phone: '+1-555-0105',
    address: '654 Maple Dr, Phoenix, AZ 85001, USA',
  },
  {
    name: 'Olivia Miller',
    email: 'olivia.m@example.com',
    phone: '+1-555-0106',
    address: '987 Cedar Ln, Philadelphia, PA 19101, USA',
  },
  {
    name: 'William Wilson',
    email: 'will.wilson@example.com',
    phone: '+1-555-0107',
    address: '147 Birch Blvd, San Antonio, TX 78201, USA',
  },
  {
    name: 'Ava Moore',
    email: 'ava.moore@example.com',
    phone: '+1-555-0108',
    address: '258 Spruce Way, San Diego, CA 92101, USA',
  },
  {
    name: 'Robert Taylor',
    email: 'rob.taylor@example.com',
    phone: '+1-555-0109',
    address: '369 Willow Ct, Dallas, TX 75201, USA',
  },
  {
    name: 'Isabella Anderson',
    email: 'isabella.a@example.com',
    phone: '+1-555-0110',
    address: '741 Ash Ter, San Jose, CA 95101, USA',
  },
];

@Injectable()
export class CustomerSeeder implements OnModuleInit {
  private readonly logger = new Logger(CustomerSeeder.name);

  constructor(
    @Inject(INJECTION_TOKENS.CUSTOMER_STORE)
    private readonly store: CustomerStore,
    @Inject(INJECTION_TOKENS.APP_CONFIG)
    private readonly config: AppConfig,
  ) {}

  async onModuleInit(): Promise<void> {
    if (!this.config.seedDatabase) {
      return;
    }

    const count = await this.store.count();
    if (count > 0) {
      this.logger.log(`Customers already seeded with ${count} records, skipping`);
      return;
    }

    this.logger.log('Seeding customers with initial data...');
    const now = new Date();
    for (const draft of SEED_DATA) {
      await this.store.insert(
        Customer.create(new CustomerDetails(draft), now, 'seed'),
      );
    }
    this.logger.log(`Customers seeded with ${SEED_DATA.length} records`);
  }
}
