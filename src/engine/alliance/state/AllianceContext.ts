// ─────────────────────────────────────────────
//  Alliance Context — everything one loaded world's alliance
//  logic reads and writes. Built by AllianceSession.init(),
//  discarded by teardown(); no module-level state.
// ─────────────────────────────────────────────

import type { IFactionHost } from '@/engine/host/IFactionHost';
import type { AllianceConfig } from '../data/types/AllianceConfig';
import type { AllianceEventBus } from '../AllianceEventBus';
import type { DeferredEventQueue } from '../systems/DeferredEventQueue';
import type { ChoiceLedger } from './ChoiceLedger';

export interface AllianceContext {
  readonly host: IFactionHost;
  readonly config: AllianceConfig;
  readonly ledger: ChoiceLedger;
  readonly queue: DeferredEventQueue;
  readonly events: AllianceEventBus;
}
