// ─────────────────────────────────────────────
//  NullChatChannel — Headless no-op stub for IChatChannel
//  Used for tests and servers with no player display.
// ─────────────────────────────────────────────

import type { IChatChannel } from './IChatChannel';
import type { ActorHandle } from '@/engine/alliance/data/types/Faction';

export class NullChatChannel implements IChatChannel {
  send(_handle: ActorHandle, _message: string): void {}
}
