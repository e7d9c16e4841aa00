// ─────────────────────────────────────────────
//  Reputation Writer — replicate a faction's standing
//  Faction → target and target → faction get the same value, and
//  so does every current member's personal reputation, so anything
//  reading personal reputation agrees with the faction level.
// ─────────────────────────────────────────────

import type { IFactionHost } from '@/engine/host/IFactionHost';
import type { ReputationDelta } from '../data/types/Alignment';
import type { FactionId } from '../data/types/Faction';

export function writeStanding(host: IFactionHost, factionId: FactionId, deltas: readonly ReputationDelta[]): void {
  const members = host.membersOf(factionId);
  for (const { faction: target, value } of deltas) {
    // A faction has no standing towards itself
    if (target.id === factionId) continue;
    host.setFactionReputation(factionId, target.id, value);
    host.setFactionReputation(target.id, factionId, value);
    for (const identityId of members) {
      host.setActorReputation(identityId, target.id, value);
    }
  }
}
