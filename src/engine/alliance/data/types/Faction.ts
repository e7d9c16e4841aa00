// ─────────────────────────────────────────────
//  Faction Types — identities, roles, host-facing views
// ─────────────────────────────────────────────

/** Opaque 64-bit faction id, stable for the faction's lifetime. */
export type FactionId = bigint;

/** Stable 64-bit player identity id. */
export type IdentityId = bigint;

/** Transient session handle a chat message arrives from. */
export type ActorHandle = string;

export type FactionRole = 'founder' | 'leader' | 'member';

/** Read-only view of a faction as the host reports it. */
export interface FactionInfo {
  readonly id: FactionId;
  readonly tag: string;
  readonly name: string;
}

/** Qualitative relation the host derives from a numeric reputation. */
export type RelationKind = 'enemy' | 'neutral' | 'ally';

const ID_PATTERN = /^-?\d+$/;

/** Parse a decimal id of any width; null when the text is not an integer. */
export function parseId(text: string): bigint | null {
  const trimmed = text.trim();
  return ID_PATTERN.test(trimmed) ? BigInt(trimmed) : null;
}
