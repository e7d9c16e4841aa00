// ─────────────────────────────────────────────
//  IFactionHost — Abstract interface to the game's faction substrate
//  Implementations: InMemoryFactionHost (headless, tests + CLI).
//  The alliance core reads and writes only through these capability
//  queries; it never owns the factions themselves.
// ─────────────────────────────────────────────

import type {
  ActorHandle,
  FactionId,
  FactionInfo,
  IdentityId,
  RelationKind,
} from '@/engine/alliance/data/types/Faction';

export interface IFactionRegistry {
  // ── Identity ──

  /** Stable identity behind a session handle, or null when unknown. */
  resolveIdentity(handle: ActorHandle): IdentityId | null;

  /** Whether the handle holds the administrative capability. */
  isAdmin(handle: ActorHandle): boolean;

  // ── Lookup ──

  /** Case-sensitive tag lookup. */
  factionByTag(tag: string): FactionInfo | null;
  factionById(id: FactionId): FactionInfo | null;
  factionOfIdentity(identityId: IdentityId): FactionInfo | null;
  allFactions(): FactionInfo[];

  // ── Membership / roles ──

  membersOf(factionId: FactionId): IdentityId[];
  isFounder(factionId: FactionId, identityId: IdentityId): boolean;
  isLeader(factionId: FactionId, identityId: IdentityId): boolean;
  /** True iff the faction has no human members. */
  isNpcOnly(factionId: FactionId): boolean;
}

export interface IReputationMatrix {
  /** Directional faction → faction reputation. */
  getFactionReputation(from: FactionId, to: FactionId): number;
  setFactionReputation(from: FactionId, to: FactionId, value: number): void;

  getActorReputation(identityId: IdentityId, factionId: FactionId): number;
  setActorReputation(identityId: IdentityId, factionId: FactionId, value: number): void;

  /** Qualitative relation the host derives from a faction → faction value. */
  relationBetween(from: FactionId, to: FactionId): RelationKind;
}

export interface FactionCreatedEvent {
  factionId: FactionId;
}

export interface MemberJoinedEvent {
  factionId: FactionId;
  identityId: IdentityId;
}

/** Host notifications. Each subscription returns its unsubscribe function. */
export interface IFactionHostEvents {
  onFactionCreated(listener: (e: FactionCreatedEvent) => void): () => void;
  onMemberJoined(listener: (e: MemberJoinedEvent) => void): () => void;
}

export interface IFactionHost extends IFactionRegistry, IReputationMatrix, IFactionHostEvents {}
