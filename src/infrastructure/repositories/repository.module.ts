/**
 * RepositoryModule: dynamic module that provides the IResourceStore.
 *
 * Only the in-memory backend exists; state lives for the lifetime of the
 * process. Registered globally so any module can inject RESOURCE_STORE.
 *
 * Usage:
 *   imports: [RepositoryModule.register()]
 */
import { Module, type DynamicModule } from '@nestjs/common';
import { RESOURCE_STORE } from '../../domain/repositories/repository.tokens';
import { InMemoryResourceStore } from './inmemory/inmemory-resource.store';

@Module({})
export class RepositoryModule {
  static register(): DynamicModule {
    return {
      module: RepositoryModule,
      global: true,
      providers: [{ provide: RESOURCE_STORE, useClass: InMemoryResourceStore }],
      exports: [RESOURCE_STORE],
    };
  }
}
