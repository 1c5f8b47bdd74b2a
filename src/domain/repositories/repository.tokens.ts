/**
 * NestJS injection tokens for repository interfaces.
 *
 * Usage:
 *   @Inject(RESOURCE_STORE) private readonly store: IResourceStore
 */
export const RESOURCE_STORE = 'RESOURCE_STORE';
