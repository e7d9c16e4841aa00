import { AllianceSession } from '@/engine/alliance/AllianceSession';
import { createAllianceConfig, type AllianceConfig } from '@/engine/alliance/data/types/AllianceConfig';
import type { AllianceContext } from '@/engine/alliance/state/AllianceContext';
import { InMemoryFactionHost } from '@/engine/host/InMemoryFactionHost';
import { MemoryWorldStorage } from '@/engine/loader/WorldStorage';

// ── World fixture ──
//
//  NPC powers:   SOBAN (1), KHAANEPH (2), UNITED (3)
//  Player MYFC (100): alice founder, bob member, dave leader
//  Player OTHR (200): carol founder
//  eve: registered, no faction    admin: admin capability, no faction
//  ghost: never registered

export const SOBAN = 1n;
export const KHAANEPH = 2n;
export const UNITED = 3n;
export const MYFC = 100n;
export const OTHR = 200n;

export const ALICE = 1001n;
export const BOB = 1002n;
export const CAROL = 1003n;
export const DAVE = 1004n;
export const EVE = 1005n;
export const FRANK = 1006n;

export function createTestHost(): InMemoryFactionHost {
  const host = new InMemoryFactionHost();
  host.registerPlayer('alice', ALICE);
  host.registerPlayer('bob', BOB);
  host.registerPlayer('carol', CAROL);
  host.registerPlayer('dave', DAVE);
  host.registerPlayer('eve', EVE);
  host.registerPlayer('frank', FRANK);
  host.registerPlayer('admin', 1900n);
  host.grantAdmin('admin');

  host.createFaction({ id: SOBAN, tag: 'SOBAN', name: 'Soban Republic', founder: 9001n });
  host.createFaction({ id: KHAANEPH, tag: 'KHAANEPH', name: 'Khaaneph Raiders', founder: 9002n });
  host.createFaction({ id: UNITED, tag: 'UNITED', name: 'United Consortium', founder: 9003n });

  host.createFaction({ id: MYFC, tag: 'MYFC', name: 'My Faction', founder: ALICE });
  host.addMember(MYFC, BOB);
  host.addMember(MYFC, DAVE, 'leader');

  host.createFaction({ id: OTHR, tag: 'OTHR', name: 'Other Faction', founder: CAROL });
  return host;
}

export interface TestWorld {
  host: InMemoryFactionHost;
  storage: MemoryWorldStorage;
  session: AllianceSession;
  ctx: AllianceContext;
}

/** Seeded host + initialised session. Seeding happens before init, so it queues nothing. */
export function createTestWorld(
  overrides: Partial<AllianceConfig> = {},
  storage: MemoryWorldStorage = new MemoryWorldStorage(),
): TestWorld {
  const host = createTestHost();
  const config = createAllianceConfig({ factions: ['SOBAN', 'KHAANEPH', 'UNITED'], ...overrides });
  const session = new AllianceSession({ host, storage, config });
  const ctx = session.init();
  return { host, storage, session, ctx };
}
