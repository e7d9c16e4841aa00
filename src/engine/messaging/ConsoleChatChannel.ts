// ─────────────────────────────────────────────
//  ConsoleChatChannel — shows feedback directly
//  Single-player / listen-server path: no network hop.
// ─────────────────────────────────────────────

import { CHAT_SENDER } from '@/config';
import type { ActorHandle } from '@/engine/alliance/data/types/Faction';
import type { IChatChannel } from './IChatChannel';

export type ChatWriter = (line: string) => void;

export class ConsoleChatChannel implements IChatChannel {
  constructor(private readonly write: ChatWriter = line => console.log(line)) {}

  send(handle: ActorHandle, message: string): void {
    this.write(`${CHAT_SENDER} → ${handle}: ${message}`);
  }
}
