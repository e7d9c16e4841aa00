// ─────────────────────────────────────────────
//  Allowed Faction Set — configured tags resolved against live factions
//  Derived on every call; a tag can stop resolving at any time.
// ─────────────────────────────────────────────

import type { AllianceConfig } from '../data/types/AllianceConfig';
import type { FactionId, FactionInfo } from '../data/types/Faction';
import type { IFactionRegistry } from '@/engine/host/IFactionHost';

type AllowedSetConfig = Pick<AllianceConfig, 'factions' | 'allowOnlyNpcFactions'>;

export const AllowedFactionSet = {
  /** Live factions for the configured tags, in configuration order. */
  resolve(registry: IFactionRegistry, config: AllowedSetConfig): FactionInfo[] {
    const result: FactionInfo[] = [];
    for (const tag of config.factions) {
      const faction = registry.factionByTag(tag);
      if (!faction) continue;
      if (config.allowOnlyNpcFactions && !registry.isNpcOnly(faction.id)) continue;
      if (result.some(f => f.id === faction.id)) continue;
      result.push(faction);
    }
    return result;
  },

  contains(allowed: readonly FactionInfo[], factionId: FactionId): boolean {
    return allowed.some(f => f.id === factionId);
  },

  /** Canonical first element in configuration order; null when empty. */
  first(allowed: readonly FactionInfo[]): FactionInfo | null {
    return allowed[0] ?? null;
  },
};
