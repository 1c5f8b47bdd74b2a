/**
 * Domain patch merger: barrel export
 */
export type {
  PatchBody,
  LegacyGroupPatch,
  CurrentGroupPatch,
  LegacyUserPatch,
  CurrentUserPatch,
  GroupPatch,
  UserPatch,
  PatchOperation,
} from './patch-types';

export { PatchMerger } from './patch-merger';
