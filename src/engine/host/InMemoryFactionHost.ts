// ─────────────────────────────────────────────
//  InMemoryFactionHost — Headless faction substrate
//  Used for tests and the CLI. Mirrors what a game server
//  exposes: factions by tag/id, roles, NPC flags, a directional
//  reputation matrix and created/joined notifications.
// ─────────────────────────────────────────────

import type {
  ActorHandle,
  FactionId,
  FactionInfo,
  FactionRole,
  IdentityId,
  RelationKind,
} from '@/engine/alliance/data/types/Faction';
import { TypedEventBus } from '@/engine/utils/EventBus';
import type {
  FactionCreatedEvent,
  IFactionHost,
  MemberJoinedEvent,
} from './IFactionHost';

interface HostEventMap {
  factionCreated: FactionCreatedEvent;
  memberJoined: MemberJoinedEvent;
}

interface FactionRecord {
  info: FactionInfo;
  members: Map<IdentityId, FactionRole>;
}

export interface RelationThresholds {
  hostileThreshold: number;
  friendlyThreshold: number;
}

export interface CreateFactionParams {
  id: FactionId;
  tag: string;
  name: string;
  founder?: IdentityId;
}

const DEFAULT_THRESHOLDS: RelationThresholds = {
  hostileThreshold: -500,
  friendlyThreshold: 500,
};

/** Derive the qualitative relation from a numeric reputation. */
export function deriveRelation(value: number, thresholds: RelationThresholds): RelationKind {
  if (value <= thresholds.hostileThreshold) return 'enemy';
  if (value >= thresholds.friendlyThreshold) return 'ally';
  return 'neutral';
}

export class InMemoryFactionHost implements IFactionHost {
  private factions = new Map<FactionId, FactionRecord>();
  private handles = new Map<ActorHandle, IdentityId>();
  private humans = new Set<IdentityId>();
  private admins = new Set<ActorHandle>();
  private factionRep = new Map<string, number>();
  private actorRep = new Map<string, number>();
  private events = new TypedEventBus<HostEventMap>();
  private thresholds: RelationThresholds;

  constructor(thresholds: Partial<RelationThresholds> = {}) {
    this.thresholds = { ...DEFAULT_THRESHOLDS, ...thresholds };
  }

  setThresholds(thresholds: Partial<RelationThresholds>): void {
    this.thresholds = { ...this.thresholds, ...thresholds };
  }

  // ════════════════════════════════════════════
  //  World mutation (what players do in-game)
  // ════════════════════════════════════════════

  /** Register a human player reachable through a session handle. */
  registerPlayer(handle: ActorHandle, identityId: IdentityId): void {
    this.handles.set(handle, identityId);
    this.humans.add(identityId);
  }

  grantAdmin(handle: ActorHandle): void {
    this.admins.add(handle);
  }

  createFaction(params: CreateFactionParams): FactionInfo {
    if (this.factions.has(params.id)) {
      throw new Error(`Faction id ${params.id} is already taken`);
    }
    if (this.factionByTag(params.tag)) {
      throw new Error(`Faction tag '${params.tag}' is already taken`);
    }
    const info: FactionInfo = { id: params.id, tag: params.tag, name: params.name };
    const members = new Map<IdentityId, FactionRole>();
    if (params.founder !== undefined) {
      this.assertFactionless(params.founder);
      members.set(params.founder, 'founder');
    }
    this.factions.set(info.id, { info, members });
    this.events.emit('factionCreated', { factionId: info.id });
    return info;
  }

  /** Add an NPC or player identity. NPC identities are never registered as players. */
  addMember(factionId: FactionId, identityId: IdentityId, role: FactionRole = 'member'): void {
    const record = this.requireFaction(factionId);
    this.assertFactionless(identityId);
    record.members.set(identityId, role);
    this.events.emit('memberJoined', { factionId, identityId });
  }

  setRole(factionId: FactionId, identityId: IdentityId, role: FactionRole): void {
    const record = this.requireFaction(factionId);
    if (!record.members.has(identityId)) {
      throw new Error(`Identity ${identityId} is not a member of faction ${factionId}`);
    }
    record.members.set(identityId, role);
  }

  removeFaction(factionId: FactionId): void {
    this.factions.delete(factionId);
  }

  // ════════════════════════════════════════════
  //  IFactionRegistry
  // ════════════════════════════════════════════

  resolveIdentity(handle: ActorHandle): IdentityId | null {
    return this.handles.get(handle) ?? null;
  }

  isAdmin(handle: ActorHandle): boolean {
    return this.admins.has(handle);
  }

  factionByTag(tag: string): FactionInfo | null {
    for (const record of this.factions.values()) {
      if (record.info.tag === tag) return record.info;
    }
    return null;
  }

  factionById(id: FactionId): FactionInfo | null {
    return this.factions.get(id)?.info ?? null;
  }

  factionOfIdentity(identityId: IdentityId): FactionInfo | null {
    for (const record of this.factions.values()) {
      if (record.members.has(identityId)) return record.info;
    }
    return null;
  }

  allFactions(): FactionInfo[] {
    return [...this.factions.values()].map(r => r.info);
  }

  membersOf(factionId: FactionId): IdentityId[] {
    const record = this.factions.get(factionId);
    return record ? [...record.members.keys()] : [];
  }

  isFounder(factionId: FactionId, identityId: IdentityId): boolean {
    return this.factions.get(factionId)?.members.get(identityId) === 'founder';
  }

  isLeader(factionId: FactionId, identityId: IdentityId): boolean {
    return this.factions.get(factionId)?.members.get(identityId) === 'leader';
  }

  isNpcOnly(factionId: FactionId): boolean {
    return this.membersOf(factionId).every(id => !this.humans.has(id));
  }

  // ════════════════════════════════════════════
  //  IReputationMatrix
  // ════════════════════════════════════════════

  getFactionReputation(from: FactionId, to: FactionId): number {
    return this.factionRep.get(`${from}:${to}`) ?? 0;
  }

  setFactionReputation(from: FactionId, to: FactionId, value: number): void {
    this.factionRep.set(`${from}:${to}`, value);
  }

  getActorReputation(identityId: IdentityId, factionId: FactionId): number {
    return this.actorRep.get(`${identityId}:${factionId}`) ?? 0;
  }

  setActorReputation(identityId: IdentityId, factionId: FactionId, value: number): void {
    this.actorRep.set(`${identityId}:${factionId}`, value);
  }

  relationBetween(from: FactionId, to: FactionId): RelationKind {
    return deriveRelation(this.getFactionReputation(from, to), this.thresholds);
  }

  // ════════════════════════════════════════════
  //  IFactionHostEvents
  // ════════════════════════════════════════════

  onFactionCreated(listener: (e: FactionCreatedEvent) => void): () => void {
    this.events.on('factionCreated', listener);
    return () => this.events.off('factionCreated', listener);
  }

  onMemberJoined(listener: (e: MemberJoinedEvent) => void): () => void {
    this.events.on('memberJoined', listener);
    return () => this.events.off('memberJoined', listener);
  }

  // --- Helpers ---

  private requireFaction(factionId: FactionId): FactionRecord {
    const record = this.factions.get(factionId);
    if (!record) throw new Error(`Unknown faction ${factionId}`);
    return record;
  }

  private assertFactionless(identityId: IdentityId): void {
    const current = this.factionOfIdentity(identityId);
    if (current) {
      throw new Error(`Identity ${identityId} already belongs to [${current.tag}]`);
    }
  }
}
