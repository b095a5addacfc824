import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { TerminusModule } from '@nestjs/terminus';

// Application - Use Cases
import { ListCustomersUseCase } from './application/use-cases/list-customers.use-case';
import { GetCustomerUseCase } from './application/use-cases/get-customer.use-case';
import { CreateCustomerUseCase } from './application/use-cases/create-customer.use-case';
import { UpdateCustomerUseCase } from './application/use-cases/update-customer.use-case';
import { DeleteCustomerUseCase } from './application/use-cases/delete-customer.use-case';
import { BulkCreateCustomersUseCase } from './application/use-cases/bulk-create-customers.use-case';
import { CheckHealthUseCase } from './application/use-cases/check-health.use-case';
import { EmailUniquenessService } from './application/services/email-uniqueness.service';

// Infrastructure
import { CustomerOrmEntity } from './infrastructure/persistence/entities/customer.orm-entity';
import { TypeOrmCustomerStore } from './infrastructure/persistence/repositories/typeorm-customer.store';
import { CustomerSeeder } from './infrastructure/persistence/seeders/customer.seeder';
import { RandomCustomerGenerator } from './infrastructure/generators/random-customer.generator';

// Presentation
import { CustomerController } from './presentation/controllers/customer.controller';
import { HealthController } from './presentation/controllers/health.controller';

// Shared
import { INJECTION_TOKENS } from '../shared/constants/injection-tokens';
import { loadAppConfig } from '../shared/config/app.config';

@Module({
  imports: [TypeOrmModule.forFeature([CustomerOrmEntity]), TerminusModule],
  controllers: [CustomerController, HealthController],
  providers: [
    { provide: INJECTION_TOKENS.APP_CONFIG, useFactory: () => loadAppConfig() },

    // Application
    EmailUniquenessService,
    ListCustomersUseCase,
    GetCustomerUseCase,
    CreateCustomerUseCase,
    UpdateCustomerUseCase,
    DeleteCustomerUseCase,
    BulkCreateCustomersUseCase,
    CheckHealthUseCase,

    // Infrastructure: bind ports → implementations
    {
      provide: INJECTION_TOKENS.CUSTOMER_STORE,
      useClass: TypeOrmCustomerStore,
    },
    {
      provide: INJECTION_TOKENS.CUSTOMER_GENERATOR,
      useClass: RandomCustomerGenerator,
    },

    // Seeder
    CustomerSeeder,
  ],
})
export class CustomerModule {}
