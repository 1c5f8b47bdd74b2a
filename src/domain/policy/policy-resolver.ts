/**
 * Capability policy with layered precedence.
 *
 * Precedence (highest to lowest):
 *   1. Runtime overrides (admin API)
 *   2. Environment overrides (SCIM_GROUPS_PUT / SCIM_GROUPS_PATCH, read once at start)
 *   3. Active profile defaults
 *   4. Built-in default (true)
 *
 * Switching profile wipes the runtime layer; the environment layer stays.
 */
import { DirectoryError } from '../errors/directory-error';

export const POLICY_FLAGS = ['groups_put', 'groups_patch'] as const;
export type PolicyFlag = (typeof POLICY_FLAGS)[number];

export type FlagMap = Partial<Record<PolicyFlag, boolean>>;

export const POLICY_PROFILES = {
  permissive: { groups_put: true, groups_patch: true },
  'restricted-put': { groups_put: false, groups_patch: true },
  'restricted-patch': { groups_put: true, groups_patch: false },
} as const satisfies Record<string, FlagMap>;

export type PolicyProfile = keyof typeof POLICY_PROFILES;

export const DEFAULT_PROFILE: PolicyProfile = 'permissive';
const BUILT_IN_DEFAULT = true;

export type PolicySource = 'override' | 'environment' | 'profile' | 'default';

export interface PolicyState {
  profile: PolicyProfile;
  effective: Record<PolicyFlag, boolean>;
  sources: Record<PolicyFlag, PolicySource>;
  overrides: FlagMap;
  environment: FlagMap;
}

export interface PolicyResolverOptions {
  profile?: string;
  environment?: FlagMap;
}

export function isPolicyFlag(name: string): name is PolicyFlag {
  return POLICY_FLAGS.some((flag) => flag === name);
}

export function isPolicyProfile(name: string): name is PolicyProfile {
  return Object.prototype.hasOwnProperty.call(POLICY_PROFILES, name);
}

/** `true/1/yes/on` (any case) → true, other non-empty text → false, unset/blank → undefined. */
export function parseFlagValue(value: string | undefined): boolean | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return ['true', '1', 'yes', 'on'].includes(value.trim().toLowerCase());
}

function assertProfile(name: string): PolicyProfile {
  if (!isPolicyProfile(name)) {
    throw new DirectoryError(
      'InvalidConfig',
      `Invalid profile '${name}'. Valid profiles: ${Object.keys(POLICY_PROFILES).join(', ')}`,
    );
  }
  return name;
}

function assertFlag(name: string): PolicyFlag {
  if (!isPolicyFlag(name)) {
    throw new DirectoryError(
      'InvalidConfig',
      `Invalid setting '${name}'. Valid settings: ${[...POLICY_FLAGS].sort().join(', ')}`,
    );
  }
  return name;
}

export class PolicyResolver {
  private profile: PolicyProfile;
  private readonly environment: FlagMap;
  private readonly overrides = new Map<PolicyFlag, boolean>();

  constructor(options: PolicyResolverOptions = {}) {
    this.profile = assertProfile(options.profile ?? DEFAULT_PROFILE);
    this.environment = {};
    for (const [name, value] of Object.entries(options.environment ?? {})) {
      if (value !== undefined) {
        this.environment[assertFlag(name)] = value;
      }
    }
  }

  get activeProfile(): PolicyProfile {
    return this.profile;
  }

  isAllowed(flag: PolicyFlag): boolean {
    return this.resolve(flag).value;
  }

  setProfile(name: string): void {
    this.profile = assertProfile(name);
    this.overrides.clear();
  }

  setOverride(name: string, value: boolean): void {
    this.overrides.set(assertFlag(name), value);
  }

  clearOverride(name: string): void {
    this.overrides.delete(assertFlag(name));
  }

  getState(): PolicyState {
    const put = this.resolve('groups_put');
    const patch = this.resolve('groups_patch');
    const overrides: FlagMap = {};
    for (const [flag, value] of this.overrides) {
      overrides[flag] = value;
    }
    return {
      profile: this.profile,
      effective: { groups_put: put.value, groups_patch: patch.value },
      sources: { groups_put: put.source, groups_patch: patch.source },
      overrides,
      environment: { ...this.environment },
    };
  }

  private resolve(flag: PolicyFlag): { value: boolean; source: PolicySource } {
    const override = this.overrides.get(flag);
    if (override !== undefined) return { value: override, source: 'override' };

    const fromEnvironment = this.environment[flag];
    if (fromEnvironment !== undefined) return { value: fromEnvironment, source: 'environment' };

    const fromProfile: boolean | undefined = POLICY_PROFILES[this.profile][flag];
    if (fromProfile !== undefined) return { value: fromProfile, source: 'profile' };

    return { value: BUILT_IN_DEFAULT, source: 'default' };
  }
}
