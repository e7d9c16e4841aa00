// ─────────────────────────────────────────────
//  Alliance Session — lifecycle of one loaded world
//  init() loads config + ledger and subscribes to the host;
//  tick() drains deferred reactions; teardown() runs what is
//  still queued, persists and lets go of the host.
// ─────────────────────────────────────────────

import { CONFIG_FILE_NAME, LEDGER_FILE_NAME } from '@/config';
import type { IFactionHost } from '@/engine/host/IFactionHost';
import { AllianceConfigLoader } from '@/engine/loader/AllianceConfigLoader';
import type { IWorldStorage } from '@/engine/loader/WorldStorage';
import { Logger } from '@/engine/utils/Logger';
import { createAllianceEventBus } from './AllianceEventBus';
import type { AlignmentResult, ResetOutcome, ResetResult } from './data/types/Alignment';
import type { AllianceConfig } from './data/types/AllianceConfig';
import type { ActorHandle, FactionId, FactionInfo } from './data/types/Faction';
import type { AllianceContext } from './state/AllianceContext';
import { ChoiceLedger } from './state/ChoiceLedger';
import { AlignmentEngine } from './systems/AlignmentEngine';
import { AllowedFactionSet } from './systems/AllowedFactionSet';
import { DeferredEventQueue, type DrainReport } from './systems/DeferredEventQueue';
import { ReputationDefaults } from './systems/ReputationDefaults';

/** Deferred actions may enqueue follow-ups; stop draining after this many rounds. */
const MAX_TEARDOWN_PASSES = 8;

export interface AllianceSessionOptions {
  host: IFactionHost;
  storage: IWorldStorage;
  configFileName?: string;
  ledgerFileName?: string;
  /** Use this config instead of reading the config file. */
  config?: AllianceConfig;
}

export class AllianceSession {
  private ctx: AllianceContext | null = null;
  private unsubscribers: (() => void)[] = [];
  private tickCount = 0;

  constructor(private readonly options: AllianceSessionOptions) {}

  // ════════════════════════════════════════════
  //  Lifecycle
  // ════════════════════════════════════════════

  init(): AllianceContext {
    if (this.ctx) throw new Error('AllianceSession is already initialised');
    const { host, storage } = this.options;

    const config = this.options.config
      ?? AllianceConfigLoader.load(storage, this.options.configFileName ?? CONFIG_FILE_NAME);
    const ledger = new ChoiceLedger(storage, this.options.ledgerFileName ?? LEDGER_FILE_NAME);
    ledger.load();

    const ctx: AllianceContext = {
      host,
      config,
      ledger,
      queue: new DeferredEventQueue(),
      events: createAllianceEventBus(),
    };

    // The host may report these before the faction is fully registered
    this.unsubscribers = [
      host.onFactionCreated(e => {
        ctx.queue.enqueue(`defaults:${e.factionId}`, () => {
          ReputationDefaults.applyDefaults(ctx, e.factionId);
        });
      }),
      host.onMemberJoined(e => {
        ctx.queue.enqueue(`sync:${e.factionId}:${e.identityId}`, () => {
          ReputationDefaults.syncMember(ctx, e.factionId, e.identityId);
        });
      }),
    ];

    this.ctx = ctx;
    this.tickCount = 0;
    Logger.log(
      `Alliance session loaded. Allowed factions: ${config.factions.length > 0 ? config.factions.join(', ') : '(none configured)'}`,
      'system',
    );
    return ctx;
  }

  teardown(): void {
    const ctx = this.ctx;
    if (!ctx) return;

    for (let pass = 0; ctx.queue.size > 0 && pass < MAX_TEARDOWN_PASSES; pass++) {
      ctx.queue.drain();
    }
    if (ctx.queue.size > 0) {
      Logger.log(`${ctx.queue.size} deferred action(s) still queued at unload`, 'warning');
    }
    for (const unsubscribe of this.unsubscribers) unsubscribe();
    this.unsubscribers = [];
    ctx.ledger.save();
    ctx.events.clear();
    this.ctx = null;
    Logger.log('Alliance session unloaded', 'system');
  }

  get isActive(): boolean {
    return this.ctx !== null;
  }

  get context(): AllianceContext {
    if (!this.ctx) throw new Error('AllianceSession is not initialised');
    return this.ctx;
  }

  get currentTick(): number {
    return this.tickCount;
  }

  // ════════════════════════════════════════════
  //  Tick
  // ════════════════════════════════════════════

  tick(): DrainReport {
    const ctx = this.context;
    const report = ctx.queue.drain();
    this.tickCount++;
    ctx.events.emit('tickCompleted', { tick: this.tickCount, ...report });
    return report;
  }

  // ════════════════════════════════════════════
  //  Operations
  // ════════════════════════════════════════════

  align(handle: ActorHandle, tag: string): AlignmentResult {
    return AlignmentEngine.align(this.context, handle, tag);
  }

  reset(tag: string): ResetResult {
    return ReputationDefaults.reset(this.context, tag);
  }

  resetAll(): ResetOutcome[] {
    return ReputationDefaults.resetAll(this.context);
  }

  allowedFactions(): FactionInfo[] {
    const ctx = this.context;
    return AllowedFactionSet.resolve(ctx.host, ctx.config);
  }

  hasChosen(factionId: FactionId): boolean {
    return this.context.ledger.has(factionId);
  }
}
