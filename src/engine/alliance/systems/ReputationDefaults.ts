// ─────────────────────────────────────────────
//  Reputation Defaults — new factions, joining members, resets
//  New player factions start hostile to every configured power
//  until they choose; joining members inherit the faction's posture.
// ─────────────────────────────────────────────

import type { ResetOutcome, ResetResult } from '../data/types/Alignment';
import type { FactionId, IdentityId } from '../data/types/Faction';
import type { AllianceContext } from '../state/AllianceContext';
import { AllianceMessages } from '../AllianceMessages';
import { AllowedFactionSet } from './AllowedFactionSet';
import { writeStanding } from './ReputationWriter';
import { Logger } from '@/engine/utils/Logger';

export interface ApplyDefaultsOptions {
  /** Apply even when the faction is NPC-only (admin reset). */
  force?: boolean;
}

function writeUniform(ctx: AllianceContext, factionId: FactionId, value: number): void {
  const allowed = AllowedFactionSet.resolve(ctx.host, ctx.config);
  writeStanding(ctx.host, factionId, allowed.map(faction => ({ faction, value })));
}

export const ReputationDefaults = {
  /**
   * Set the configured default towards every allowed faction.
   * Never touches the ledger. Returns false when nothing was applied.
   */
  applyDefaults(ctx: AllianceContext, factionId: FactionId, opts: ApplyDefaultsOptions = {}): boolean {
    const faction = ctx.host.factionById(factionId);
    if (!faction) {
      Logger.log(`Skipping defaults: faction ${factionId} no longer exists`, 'warning');
      return false;
    }
    if (!opts.force && ctx.host.isNpcOnly(factionId)) return false;

    const { config } = ctx;
    if (!config.twoPhaseDefault) {
      writeUniform(ctx, factionId, config.defaultReputation);
      ctx.events.emit('defaultsApplied', { factionId, value: config.defaultReputation, phase: 'final' });
      Logger.log(`Applied default reputation ${config.defaultReputation} to [${faction.tag}]`, 'action');
      return true;
    }

    writeUniform(ctx, factionId, config.twoPhaseSeedReputation);
    ctx.events.emit('defaultsApplied', { factionId, value: config.twoPhaseSeedReputation, phase: 'seed' });
    ctx.queue.enqueue(`defaults-final:${factionId}`, () => {
      if (!ctx.host.factionById(factionId)) return;
      // An alignment made in between owns the standing now
      if (ctx.ledger.has(factionId)) return;
      writeUniform(ctx, factionId, config.defaultReputation);
      ctx.events.emit('defaultsApplied', { factionId, value: config.defaultReputation, phase: 'final' });
    });
    Logger.log(`Seeded reputation ${config.twoPhaseSeedReputation} for [${faction.tag}], default follows next tick`, 'action');
    return true;
  },

  /** Copy the faction's current standing onto a newly joined member. */
  syncMember(ctx: AllianceContext, factionId: FactionId, identityId: IdentityId): boolean {
    const { host } = ctx;
    const faction = host.factionById(factionId);
    if (!faction) {
      Logger.log(`Skipping member sync: faction ${factionId} no longer exists`, 'warning');
      return false;
    }
    if (host.isNpcOnly(factionId)) return false;
    if (!host.membersOf(factionId).includes(identityId)) return false;

    for (const target of AllowedFactionSet.resolve(host, ctx.config)) {
      if (target.id === factionId) continue;
      host.setActorReputation(identityId, target.id, host.getFactionReputation(factionId, target.id));
    }
    ctx.events.emit('memberSynced', { factionId, identityId });
    return true;
  },

  /** Admin: restore defaults for one faction and allow it to choose again. */
  reset(ctx: AllianceContext, tag: string): ResetResult {
    const faction = ctx.host.factionByTag(tag);
    if (!faction) {
      return { ok: false, kind: 'UnknownFaction', message: AllianceMessages.unknownFaction(tag) };
    }

    ReputationDefaults.applyDefaults(ctx, faction.id, { force: true });
    const wasCommitted = ctx.ledger.remove(faction.id);
    ctx.events.emit('choiceReset', { factionId: faction.id, wasCommitted });
    Logger.log(`Alliance choice reset for [${faction.tag}]`, 'action');

    return {
      ok: true,
      outcome: { faction, wasCommitted },
      message: AllianceMessages.reset(faction, wasCommitted, ctx.config.defaultReputation),
    };
  },

  /** Admin: reset every player faction, persisting once at the end. */
  resetAll(ctx: AllianceContext): ResetOutcome[] {
    const outcomes: ResetOutcome[] = [];
    for (const faction of ctx.host.allFactions()) {
      if (ctx.host.isNpcOnly(faction.id)) continue;
      ReputationDefaults.applyDefaults(ctx, faction.id, { force: true });
      const wasCommitted = ctx.ledger.remove(faction.id, false);
      ctx.events.emit('choiceReset', { factionId: faction.id, wasCommitted });
      outcomes.push({ faction, wasCommitted });
    }
    ctx.ledger.save();
    Logger.log(`Alliance choices reset for ${outcomes.length} player faction(s)`, 'action');
    return outcomes;
  },
};
