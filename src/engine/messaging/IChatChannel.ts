// ─────────────────────────────────────────────
//  IChatChannel — outbound feedback to one player
//  Implementations: ConsoleChatChannel (local display),
//  RelayChatChannel (dedicated server → client packets),
//  NullChatChannel (headless).
// ─────────────────────────────────────────────

import type { ActorHandle } from '@/engine/alliance/data/types/Faction';

export interface IChatChannel {
  send(handle: ActorHandle, message: string): void;
}
