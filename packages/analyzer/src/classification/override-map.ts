import type { MappingDeclaration, MemberConfig } from '@mapcheck/core';

export type OverrideMap = ReadonlyMap<string, MemberConfig>;

/**
 * Effective configuration per destination member. Later configurations for
 * the same member replace earlier ones.
 */
export function buildOverrideMap(declaration: MappingDeclaration): OverrideMap {
  const overrides = new Map<string, MemberConfig>();
  for (const config of declaration.memberConfigs) {
    overrides.set(config.destMember, config);
  }
  return overrides;
}
