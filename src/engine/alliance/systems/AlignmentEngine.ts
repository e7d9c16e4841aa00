// ─────────────────────────────────────────────
//  Alignment Engine — the one-time alliance choice
//  validate → compute → write every standing → commit to ledger.
//  Failures are values and leave the world untouched; the ledger
//  entry is only recorded after all reputation writes.
// ─────────────────────────────────────────────

import type {
  AlignmentFailure,
  AlignmentFailureKind,
  AlignmentRequest,
  AlignmentResult,
  ReputationDelta,
} from '../data/types/Alignment';
import type { AllianceConfig } from '../data/types/AllianceConfig';
import type { ActorHandle, FactionInfo } from '../data/types/Faction';
import type { AllianceContext } from '../state/AllianceContext';
import { AllianceMessages } from '../AllianceMessages';
import { AllowedFactionSet } from './AllowedFactionSet';
import { writeStanding } from './ReputationWriter';
import { Logger } from '@/engine/utils/Logger';

type Validation = { ok: true; request: AlignmentRequest } | AlignmentFailure;

function fail(kind: AlignmentFailureKind, tag: string, faction?: FactionInfo): AlignmentFailure {
  return { ok: false, kind, message: AllianceMessages.failure(kind, { tag, faction }) };
}

export const AlignmentEngine = {
  /** Run the precondition checks in order; the first failing one wins. */
  validate(ctx: AllianceContext, handle: ActorHandle, tag: string): Validation {
    const { host, ledger, config } = ctx;

    const identityId = host.resolveIdentity(handle);
    if (identityId === null) return fail('IdentityUnresolved', tag);

    const faction = host.factionOfIdentity(identityId);
    if (!faction) return fail('NoFaction', tag);

    if (!host.isFounder(faction.id, identityId) && !host.isLeader(faction.id, identityId)) {
      return fail('InsufficientRole', tag, faction);
    }

    if (ledger.has(faction.id)) return fail('AlreadyCommitted', tag, faction);

    const target = host.factionByTag(tag);
    if (!target) return fail('UnknownTarget', tag, faction);

    const allowed = AllowedFactionSet.resolve(host, config);
    if (!AllowedFactionSet.contains(allowed, target.id)) return fail('TargetNotAllowed', tag, faction);

    if (target.id === faction.id) return fail('SelfAlignment', tag, faction);

    return { ok: true, request: { handle, identityId, faction, target, allowed } };
  },

  /** Ally value for the target, enemy value for every other allowed faction. */
  computeDeltas(
    allowed: readonly FactionInfo[],
    target: FactionInfo,
    config: Pick<AllianceConfig, 'allyReputation' | 'enemyReputation'>,
  ): ReputationDelta[] {
    return allowed.map(faction => ({
      faction,
      value: faction.id === target.id ? config.allyReputation : config.enemyReputation,
    }));
  },

  align(ctx: AllianceContext, handle: ActorHandle, tag: string): AlignmentResult {
    const validation = AlignmentEngine.validate(ctx, handle, tag);
    if (!validation.ok) return validation;

    const { faction, target, allowed } = validation.request;
    const { config } = ctx;
    const deltas = AlignmentEngine.computeDeltas(allowed, target, config);

    writeStanding(ctx.host, faction.id, deltas);
    for (const d of deltas) {
      if (d.faction.id === faction.id) continue;
      Logger.log(`Set reputation [${faction.tag}] <-> [${d.faction.tag}] to ${d.value}`, 'action');
    }

    ctx.ledger.commit(faction.id);

    ctx.events.emit('alignmentCommitted', {
      factionId: faction.id,
      allyId: target.id,
      enemyIds: deltas
        .filter(d => d.faction.id !== target.id && d.faction.id !== faction.id)
        .map(d => d.faction.id),
    });
    Logger.log(`[${faction.tag}] aligned with [${target.tag}] (requested by ${handle})`, 'system');

    return {
      ok: true,
      faction,
      ally: target,
      deltas,
      messages: AllianceMessages.aligned(faction, target, config.allyReputation, config.enemyReputation, allowed.length),
    };
  },
};
