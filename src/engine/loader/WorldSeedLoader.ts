// ─────────────────────────────────────────────
//  WorldSeedLoader
//  Populates an InMemoryFactionHost from a world's `world.json`
//  so the CLI has players and factions to work with.
// ─────────────────────────────────────────────

import { z } from 'zod';
import type { InMemoryFactionHost } from '@/engine/host/InMemoryFactionHost';
import type { IWorldStorage } from './WorldStorage';

export const WORLD_SEED_FILE_NAME = 'world.json';

/** JSON numbers lose precision above 2^53, so wide ids are written as strings. */
const IdValue = z
  .union([z.number().int().safe(), z.string().regex(/^-?\d+$/, 'expected an integer id')])
  .transform(v => BigInt(v));

const MemberSeedSchema = z.object({
  identityId: IdValue,
  role: z.enum(['founder', 'leader', 'member']).default('member'),
});

const FactionSeedSchema = z.object({
  id: IdValue,
  tag: z.string().min(1),
  name: z.string().min(1),
  members: z.array(MemberSeedSchema).default([]),
});

export const WorldSeedSchema = z.object({
  players: z.array(z.object({
    handle: z.string().min(1),
    identityId: IdValue,
  })).default([]),
  admins: z.array(z.string().min(1)).default([]),
  factions: z.array(FactionSeedSchema).default([]),
});

export type WorldSeed = z.infer<typeof WorldSeedSchema>;

export function parseWorldSeed(json: string): WorldSeed {
  return WorldSeedSchema.parse(JSON.parse(json));
}

/** Apply a seed to an empty host. Founders are created with the faction. */
export function seedHost(host: InMemoryFactionHost, seed: WorldSeed): void {
  for (const p of seed.players) host.registerPlayer(p.handle, p.identityId);
  for (const admin of seed.admins) host.grantAdmin(admin);

  for (const f of seed.factions) {
    const founder = f.members.find(m => m.role === 'founder');
    host.createFaction({ id: f.id, tag: f.tag, name: f.name, founder: founder?.identityId });
    for (const m of f.members) {
      if (m === founder) continue;
      host.addMember(f.id, m.identityId, m.role);
    }
  }
}

export const WorldSeedLoader = {
  /** Seed the host from storage. Returns false when the world has no seed file. */
  load(storage: IWorldStorage, host: InMemoryFactionHost): boolean {
    if (!storage.exists(WORLD_SEED_FILE_NAME)) return false;
    seedHost(host, parseWorldSeed(storage.read(WORLD_SEED_FILE_NAME)));
    return true;
  },
};
