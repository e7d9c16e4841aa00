// ─────────────────────────────────────────────
//  Host Commands — world events typed into the CLI
//    !create <id> <TAG> <handle> <name...>   a player founds a faction
//    !join <TAG> <handle>                    a player joins a faction
// ─────────────────────────────────────────────

import { parseId } from '@/engine/alliance/data/types/Faction';
import { Logger } from '@/engine/utils/Logger';
import type { InMemoryFactionHost } from './InMemoryFactionHost';

const CREATE_USAGE = 'usage: !create <id> <TAG> <handle> <name...>';
const JOIN_USAGE = 'usage: !join <TAG> <handle>';

/** Apply one `!` line to the host. Returns false when the line was rejected. */
export function runHostCommand(host: InMemoryFactionHost, line: string): boolean {
  const [cmd, ...args] = line.trim().split(/\s+/);
  switch (cmd) {
    case '!create': {
      const [idRaw, tag, handle, ...nameParts] = args;
      const id = idRaw ? parseId(idRaw) : null;
      const founder = handle ? host.resolveIdentity(handle) : null;
      if (id === null || !tag || founder === null) {
        Logger.log(CREATE_USAGE, 'warning');
        return false;
      }
      host.createFaction({ id, tag, name: nameParts.join(' ') || tag, founder });
      return true;
    }
    case '!join': {
      const [tag, handle] = args;
      const faction = tag ? host.factionByTag(tag) : null;
      const identityId = handle ? host.resolveIdentity(handle) : null;
      if (!faction || identityId === null) {
        Logger.log(JOIN_USAGE, 'warning');
        return false;
      }
      host.addMember(faction.id, identityId);
      return true;
    }
    default:
      Logger.log(`Unknown host command '${cmd ?? ''}'`, 'warning');
      return false;
  }
}
