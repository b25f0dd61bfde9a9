import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';

// Application - Services
import { CustomerQueryService } from './application/services/customer-query.service';

// Application - Use Cases
import { RegisterCustomerUseCase } from './application/use-cases/register-customer.use-case';
import { GetCustomerUseCase } from './application/use-cases/get-customer.use-case';
import { UpdateCustomerUseCase } from './application/use-cases/update-customer.use-case';
import { RemoveCustomerUseCase } from './application/use-cases/remove-customer.use-case';
import { RecordInteractionUseCase } from './application/use-cases/record-interaction.use-case';
import { RemoveInteractionUseCase } from './application/use-cases/remove-interaction.use-case';
import { SearchCustomersUseCase } from './application/use-cases/search-customers.use-case';
import { SearchInteractionsUseCase } from './application/use-cases/search-interactions.use-case';
import { PersistCustomersUseCase } from './application/use-cases/persist-customers.use-case';
import { CheckHealthUseCase } from './application/use-cases/check-health.use-case';

// Infrastructure - Persistence
import { FlatFileCustomerRepository } from './infrastructure/persistence/repositories/flat-file-customer.repository';
import { CustomerStoreLifecycle } from './infrastructure/persistence/lifecycle/customer-store.lifecycle';

// Presentation
import { CustomerController } from './presentation/controllers/customer.controller';
import { InteractionController } from './presentation/controllers/interaction.controller';
import { StoreController } from './presentation/controllers/store.controller';
import { HealthController } from './presentation/controllers/health.controller';

// Shared
import { INJECTION_TOKENS } from '../shared/constants/injection-tokens';
import { loadAppConfig } from '../shared/config/app.config';

@Module({
  imports: [TerminusModule],
  controllers: [
    CustomerController,
    InteractionController,
    StoreController,
    HealthController,
  ],
  providers: [
    {
      provide: INJECTION_TOKENS.APP_CONFIG,
      useFactory: () => loadAppConfig(),
    },

    // Infrastructure: bind interfaces → implementations
    {
      provide: INJECTION_TOKENS.CUSTOMER_REPOSITORY,
      useClass: FlatFileCustomerRepository,
    },

    // Read-only query engine over the store
    CustomerQueryService,

    // Application use cases
    RegisterCustomerUseCase,
    GetCustomerUseCase,
    UpdateCustomerUseCase,
    RemoveCustomerUseCase,
    RecordInteractionUseCase,
    RemoveInteractionUseCase,
    SearchCustomersUseCase,
    SearchInteractionsUseCase,
    PersistCustomersUseCase,
    CheckHealthUseCase,

    // Load on start, save on shutdown
    CustomerStoreLifecycle,
  ],
})
export class CustomerModule {}
