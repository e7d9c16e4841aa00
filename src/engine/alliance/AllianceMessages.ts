// ─────────────────────────────────────────────
//  Alliance Messages — player-facing feedback text
// ─────────────────────────────────────────────

import { COMMAND_PREFIX } from '@/config';
import type { AlignmentFailureKind } from './data/types/Alignment';
import type { FactionInfo, RelationKind } from './data/types/Faction';

const LIST_HINT = `Use ${COMMAND_PREFIX} list to see available factions.`;

export const AllianceMessages = {
  failure(kind: AlignmentFailureKind, ctx: { tag: string; faction?: FactionInfo }): string {
    switch (kind) {
      case 'IdentityUnresolved':
        return 'Error: Could not resolve your player identity.';
      case 'NoFaction':
        return 'You must be in a faction to choose an alliance.';
      case 'InsufficientRole':
        return 'Only the founder or a leader of your faction can choose an alliance.';
      case 'AlreadyCommitted':
        return `Your faction [${ctx.faction?.tag ?? ctx.tag}] has already chosen an alliance.`;
      case 'UnknownTarget':
        return `Faction with tag '${ctx.tag}' not found. ${LIST_HINT}`;
      case 'TargetNotAllowed':
        return `Faction [${ctx.tag}] is not available for alliance. ${LIST_HINT}`;
      case 'SelfAlignment':
        return 'Your faction cannot ally with itself.';
    }
  },

  aligned(faction: FactionInfo, ally: FactionInfo, allyRep: number, enemyRep: number, allowedCount: number): string[] {
    const lines = [
      `Your faction [${faction.tag}] has aligned with [${ally.tag}] ${ally.name}!`,
      `  Reputation set to ${allyRep} with [${ally.tag}].`,
    ];
    if (allowedCount > 1) {
      lines.push(`  Reputation set to ${enemyRep} with all other alliance factions.`);
    }
    return lines;
  },

  help(isAdmin: boolean): string[] {
    const lines = [
      'Faction Alliance Commands:',
      `  ${COMMAND_PREFIX} <FactionTag>  - Align your faction with a faction`,
      `  ${COMMAND_PREFIX} list          - Show available factions`,
      `  ${COMMAND_PREFIX} status        - Show your current reputation`,
      `  ${COMMAND_PREFIX} help          - Show this help`,
    ];
    if (isAdmin) {
      lines.push(`  ${COMMAND_PREFIX} reset <Tag>   - Let a faction choose again`);
      lines.push(`  ${COMMAND_PREFIX} resetall      - Let every player faction choose again`);
    }
    return lines;
  },

  list(allowed: readonly FactionInfo[]): string[] {
    if (allowed.length === 0) return ['No alliance factions are currently configured.'];
    return ['Available Alliance Factions:', ...allowed.map(f => `  [${f.tag}] ${f.name}`)];
  },

  statusHeader(): string {
    return 'Your Faction Reputations:';
  },

  statusLine(faction: FactionInfo, rep: number, relation: RelationKind | null): string {
    const base = `  [${faction.tag}] ${faction.name}: ${rep}`;
    return relation ? `${base} (${relation})` : base;
  },

  statusChoice(own: FactionInfo | null, hasChosen: boolean): string {
    if (!own) return '  (You are not in a faction)';
    return hasChosen
      ? `  (Your faction [${own.tag}] has already chosen an alliance)`
      : `  (Your faction [${own.tag}] has not yet chosen an alliance)`;
  },

  noPermission(): string {
    return 'You do not have permission to use that command.';
  },

  resetUsage(): string {
    return `Usage: ${COMMAND_PREFIX} reset <FactionTag>`;
  },

  unknownFaction(tag: string): string {
    return `Faction with tag '${tag}' not found.`;
  },

  reset(faction: FactionInfo, wasCommitted: boolean, defaultRep: number): string {
    return wasCommitted
      ? `Alliance choice for [${faction.tag}] has been reset. Reputation set to ${defaultRep} with all alliance factions.`
      : `[${faction.tag}] had no alliance choice recorded. Reputation set to ${defaultRep} with all alliance factions.`;
  },

  resetAll(count: number, defaultRep: number): string {
    return `Reset ${count} player faction(s). Reputation set to ${defaultRep} with all alliance factions.`;
  },
};
