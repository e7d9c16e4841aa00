// ─────────────────────────────────────────────
//  Alliance Config — per-world settings
// ─────────────────────────────────────────────

export interface AllianceConfig {
  /** Ordered target faction tags players can align with. */
  factions: string[];
  allyReputation: number;
  enemyReputation: number;
  /** Applied to every new player faction until it chooses. */
  defaultReputation: number;
  allowOnlyNpcFactions: boolean;
  /** Write `twoPhaseSeedReputation` first, the default one tick later. */
  twoPhaseDefault: boolean;
  twoPhaseSeedReputation: number;
  /** At or below this value the host reports `enemy`. */
  hostileThreshold: number;
  /** At or above this value the host reports `ally`. */
  friendlyThreshold: number;
}

export const DEFAULT_ALLIANCE_CONFIG: Readonly<AllianceConfig> = {
  factions: [],
  allyReputation: 1500,
  enemyReputation: -1500,
  defaultReputation: -600,
  allowOnlyNpcFactions: true,
  twoPhaseDefault: false,
  twoPhaseSeedReputation: -1500,
  hostileThreshold: -500,
  friendlyThreshold: 500,
};

export function createAllianceConfig(overrides: Partial<AllianceConfig> = {}): AllianceConfig {
  return {
    ...DEFAULT_ALLIANCE_CONFIG,
    ...overrides,
    factions: [...(overrides.factions ?? DEFAULT_ALLIANCE_CONFIG.factions)],
  };
}
