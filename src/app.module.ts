import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { LoggerModule } from 'nestjs-pino';
import { CustomerModule } from './customer/customer.module';
import { CustomerOrmEntity } from './customer/infrastructure/persistence/entities/customer.orm-entity';
import { loadAppConfig } from './shared/config/app.config';

@Module({
  imports: [
    // Structured logging
    LoggerModule.forRootAsync({
      useFactory: () => {
        const config = loadAppConfig();
        return {
          pinoHttp: {
            level: config.logLevel,
            transport: config.prettyLogs
              ? { target: 'pino-pretty', options: { colorize: true } }
              : undefined,
          },
        };
      },
    }),

    // SQLite customer database
    TypeOrmModule.forRootAsync({
      useFactory: () => ({
        type: 'sqlite',
        database: loadAppConfig().databasePath,
        entities: [CustomerOrmEntity],
        synchronize: true, // Creates the table and the partial unique index
      }),
    }),

    // Feature modules
    CustomerModule,
  ],
})
export class AppModule {}
