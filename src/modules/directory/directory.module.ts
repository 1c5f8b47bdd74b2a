import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { PatchMerger } from '../../domain/patch';
import { PolicyResolver, parseFlagValue } from '../../domain/policy/policy-resolver';
import type { IResourceStore } from '../../domain/repositories/resource-store.interface';
import { RESOURCE_STORE } from '../../domain/repositories/repository.tokens';
import { RepositoryModule } from '../../infrastructure/repositories/repository.module';
import { LogCategory } from '../logging/log-levels';
import { ScimLogger } from '../logging/scim-logger.service';
import { DirectoryFacade } from './directory.facade';

/**
 * Builds the policy from SCIM_PROFILE / SCIM_GROUPS_PUT / SCIM_GROUPS_PATCH.
 * An unknown profile aborts start-up.
 */
export function createPolicyResolver(config: ConfigService, logger: ScimLogger): PolicyResolver {
  try {
    const policy = new PolicyResolver({
      profile: config.get<string>('SCIM_PROFILE') || undefined,
      environment: {
        groups_put: parseFlagValue(config.get<string>('SCIM_GROUPS_PUT')),
        groups_patch: parseFlagValue(config.get<string>('SCIM_GROUPS_PATCH')),
      },
    });
    logger.info(LogCategory.POLICY, 'Policy initialised', { ...policy.getState() });
    return policy;
  } catch (error) {
    logger.fatal(LogCategory.POLICY, 'Invalid policy configuration', error);
    throw error;
  }
}

@Module({
  imports: [RepositoryModule.register()],
  providers: [
    {
      provide: PolicyResolver,
      useFactory: createPolicyResolver,
      inject: [ConfigService, ScimLogger],
    },
    {
      provide: PatchMerger,
      useFactory: (store: IResourceStore) => new PatchMerger(store),
      inject: [RESOURCE_STORE],
    },
    DirectoryFacade,
  ],
  exports: [DirectoryFacade],
})
export class DirectoryModule {}
