// ─────────────────────────────────────────────
//  Alliance Event Bus — session-scoped domain events
//  One instance per AllianceSession, so two loaded worlds
//  never hear each other.
// ─────────────────────────────────────────────

import { TypedEventBus } from '@/engine/utils/EventBus';
import type { FactionId, IdentityId } from './data/types/Faction';

export type DefaultsPhase = 'seed' | 'final';

export interface AllianceEventMap {
  alignmentCommitted: { factionId: FactionId; allyId: FactionId; enemyIds: FactionId[] };
  defaultsApplied:    { factionId: FactionId; value: number; phase: DefaultsPhase };
  memberSynced:       { factionId: FactionId; identityId: IdentityId };
  choiceReset:        { factionId: FactionId; wasCommitted: boolean };
  tickCompleted:      { tick: number; ran: number; failed: number };
}

export type AllianceEventBus = TypedEventBus<AllianceEventMap>;

export function createAllianceEventBus(): AllianceEventBus {
  return new TypedEventBus<AllianceEventMap>();
}
