// ─────────────────────────────────────────────
//  AllianceCoordinator — Bridges chat ↔ AllianceSession ↔ IChatChannel
//  Parses `/alliance ...` lines, gates admin commands, runs the
//  operation within the current tick and sends the feedback lines.
// ─────────────────────────────────────────────

import { COMMAND_PREFIX } from '@/config';
import type { AllianceSession } from '@/engine/alliance/AllianceSession';
import { AllianceMessages } from '@/engine/alliance/AllianceMessages';
import type { ActorHandle } from '@/engine/alliance/data/types/Faction';
import { AllowedFactionSet } from '@/engine/alliance/systems/AllowedFactionSet';
import type { IChatChannel } from '@/engine/messaging/IChatChannel';
import { Logger } from '@/engine/utils/Logger';

export type AllianceCommand =
  | { kind: 'help' }
  | { kind: 'list' }
  | { kind: 'status' }
  | { kind: 'reset'; tag: string | null }
  | { kind: 'resetAll' }
  | { kind: 'align'; tag: string };

/**
 * Parse a chat line. Returns null for anything that is not an alliance command.
 * Subcommand names are case-insensitive; faction tags are passed through as typed.
 */
export function parseAllianceCommand(text: string): AllianceCommand | null {
  const line = text.trimStart();
  if (line.slice(0, COMMAND_PREFIX.length).toLowerCase() !== COMMAND_PREFIX) return null;

  const rest = line.slice(COMMAND_PREFIX.length);
  if (rest.length > 0 && !/^\s/.test(rest)) return null;

  const args = rest.trim();
  const lower = args.toLowerCase();
  if (args.length === 0 || lower === 'help') return { kind: 'help' };
  if (lower === 'list') return { kind: 'list' };
  if (lower === 'status') return { kind: 'status' };
  if (lower === 'resetall') return { kind: 'resetAll' };

  const reset = /^reset(?:\s+(.*))?$/i.exec(args);
  if (reset) {
    const tag = reset[1]?.trim() ?? '';
    return { kind: 'reset', tag: tag.length > 0 ? tag : null };
  }

  return { kind: 'align', tag: args };
}

export class AllianceCoordinator {
  constructor(
    private readonly session: AllianceSession,
    private readonly chat: IChatChannel,
  ) {}

  /**
   * Handle one chat line from a player.
   * Returns true when the line was an alliance command and must not be
   * relayed to other players.
   */
  handleMessage(handle: ActorHandle, text: string): boolean {
    const command = parseAllianceCommand(text);
    if (!command) return false;
    this.execute(handle, command);
    return true;
  }

  execute(handle: ActorHandle, command: AllianceCommand): void {
    switch (command.kind) {
      case 'help':
        this.reply(handle, AllianceMessages.help(this.session.context.host.isAdmin(handle)));
        break;
      case 'list':
        this.reply(handle, AllianceMessages.list(this.session.allowedFactions()));
        break;
      case 'status':
        this.sendStatus(handle);
        break;
      case 'reset':
        this.runReset(handle, command.tag);
        break;
      case 'resetAll':
        this.runResetAll(handle);
        break;
      case 'align':
        this.runAlign(handle, command.tag);
        break;
    }
  }

  // ════════════════════════════════════════════
  //  Commands
  // ════════════════════════════════════════════

  private runAlign(handle: ActorHandle, tag: string): void {
    const result = this.session.align(handle, tag);
    if (result.ok) {
      this.reply(handle, result.messages);
    } else {
      Logger.log(`Alignment by ${handle} to '${tag}' refused: ${result.kind}`);
      this.reply(handle, [result.message]);
    }
  }

  private sendStatus(handle: ActorHandle): void {
    const { host } = this.session.context;
    const identityId = host.resolveIdentity(handle);
    if (identityId === null) {
      this.reply(handle, [AllianceMessages.failure('IdentityUnresolved', { tag: '' })]);
      return;
    }

    const allowed = this.session.allowedFactions();
    if (AllowedFactionSet.first(allowed) === null) {
      this.reply(handle, AllianceMessages.list(allowed));
      return;
    }

    const own = host.factionOfIdentity(identityId);
    const lines = [AllianceMessages.statusHeader()];
    for (const faction of allowed) {
      const relation = own && own.id !== faction.id ? host.relationBetween(own.id, faction.id) : null;
      lines.push(AllianceMessages.statusLine(faction, host.getActorReputation(identityId, faction.id), relation));
    }
    lines.push(AllianceMessages.statusChoice(own, own ? this.session.hasChosen(own.id) : false));
    this.reply(handle, lines);
  }

  private runReset(handle: ActorHandle, tag: string | null): void {
    if (!this.requireAdmin(handle)) return;
    if (tag === null) {
      this.reply(handle, [AllianceMessages.resetUsage()]);
      return;
    }
    const result = this.session.reset(tag);
    this.reply(handle, [result.message]);
  }

  private runResetAll(handle: ActorHandle): void {
    if (!this.requireAdmin(handle)) return;
    const outcomes = this.session.resetAll();
    this.reply(handle, [AllianceMessages.resetAll(outcomes.length, this.session.context.config.defaultReputation)]);
  }

  // --- Helpers ---

  private requireAdmin(handle: ActorHandle): boolean {
    if (this.session.context.host.isAdmin(handle)) return true;
    Logger.log(`Refused admin command from ${handle}`, 'warning');
    this.reply(handle, [AllianceMessages.noPermission()]);
    return false;
  }

  private reply(handle: ActorHandle, lines: readonly string[]): void {
    for (const line of lines) this.chat.send(handle, line);
  }
}
