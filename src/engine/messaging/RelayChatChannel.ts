// ─────────────────────────────────────────────
//  RelayChatChannel — feedback over the network
//  Dedicated servers cannot display chat, so each line travels to
//  the player's client as UTF-8 `CHAT:<message>` on a fixed channel.
// ─────────────────────────────────────────────

import { NETWORK_CHANNEL_ID } from '@/config';
import type { ActorHandle } from '@/engine/alliance/data/types/Faction';
import { Logger } from '@/engine/utils/Logger';
import type { IChatChannel } from './IChatChannel';

export const RELAY_PREFIX = 'CHAT:';

/** Host function that delivers a reliable packet to one client. */
export type PacketSender = (channelId: number, payload: Uint8Array, recipient: ActorHandle) => void;

const encoder = new TextEncoder();
const decoder = new TextDecoder('utf-8', { fatal: true });

export function encodeRelayMessage(message: string): Uint8Array {
  return encoder.encode(RELAY_PREFIX + message);
}

/** Client side: the chat line, or null for packets that are not feedback. */
export function decodeRelayMessage(payload: Uint8Array): string | null {
  let text: string;
  try {
    text = decoder.decode(payload);
  } catch (err) {
    Logger.log(`Dropped undecodable relay packet: ${Logger.describe(err)}`, 'warning');
    return null;
  }
  return text.startsWith(RELAY_PREFIX) ? text.slice(RELAY_PREFIX.length) : null;
}

export class RelayChatChannel implements IChatChannel {
  constructor(
    private readonly sendPacket: PacketSender,
    private readonly channelId: number = NETWORK_CHANNEL_ID,
  ) {}

  send(handle: ActorHandle, message: string): void {
    this.sendPacket(this.channelId, encodeRelayMessage(message), handle);
  }
}
