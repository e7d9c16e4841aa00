// ─────────────────────────────────────────────
//  Alignment Types — requests and outcomes
// ─────────────────────────────────────────────

import type { ActorHandle, FactionInfo, IdentityId } from './Faction';

export type AlignmentFailureKind =
  | 'IdentityUnresolved'
  | 'NoFaction'
  | 'InsufficientRole'
  | 'AlreadyCommitted'
  | 'UnknownTarget'
  | 'TargetNotAllowed'
  | 'SelfAlignment';

export interface AlignmentFailure {
  ok: false;
  kind: AlignmentFailureKind;
  message: string;
}

/** A validated request, ready to apply. */
export interface AlignmentRequest {
  handle: ActorHandle;
  identityId: IdentityId;
  faction: FactionInfo;
  target: FactionInfo;
  allowed: FactionInfo[];
}

/** Reputation the requester ends up with towards one allowed faction. */
export interface ReputationDelta {
  faction: FactionInfo;
  value: number;
}

export interface AlignmentSuccess {
  ok: true;
  faction: FactionInfo;
  ally: FactionInfo;
  deltas: ReputationDelta[];
  messages: string[];
}

export type AlignmentResult = AlignmentSuccess | AlignmentFailure;

export type ResetFailureKind = 'UnknownFaction';

export interface ResetOutcome {
  faction: FactionInfo;
  /** Whether the faction had a recorded choice before the reset. */
  wasCommitted: boolean;
}

export type ResetResult =
  | { ok: true; outcome: ResetOutcome; message: string }
  | { ok: false; kind: ResetFailureKind; message: string };
