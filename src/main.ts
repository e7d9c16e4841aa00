// ─────────────────────────────────────────────
//  Entry point — Faction Alliance CLI
//
//  Runs one alliance session against a world directory and reads
//  input lines from stdin:
//    <handle>: <chat text>            a player chats (e.g. `alice: /alliance SOBAN`)
//    !create <id> <TAG> <handle> <name...>   a player founds a faction
//    !join <TAG> <handle>              a player joins a faction
//
//  WORLD_DIR selects the world (default worlds/sample), TICK_MS the tick interval.
// ─────────────────────────────────────────────

import 'dotenv/config';
import path from 'node:path';
import readline from 'node:readline';
import { fileURLToPath } from 'node:url';
import { DEFAULT_TICK_MS, DEFAULT_WORLD_DIR } from './config';
import { AllianceSession } from './engine/alliance/AllianceSession';
import { AllianceCoordinator } from './engine/coordinator/AllianceCoordinator';
import { runHostCommand } from './engine/host/HostCommands';
import { InMemoryFactionHost } from './engine/host/InMemoryFactionHost';
import { WorldSeedLoader } from './engine/loader/WorldSeedLoader';
import { FileWorldStorage } from './engine/loader/WorldStorage';
import { ConsoleChatChannel } from './engine/messaging/ConsoleChatChannel';
import { Logger } from './engine/utils/Logger';

const projectRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..');
const worldDir = path.resolve(projectRoot, process.env['WORLD_DIR'] ?? DEFAULT_WORLD_DIR);
const tickMsRaw = Number(process.env['TICK_MS'] ?? DEFAULT_TICK_MS);
const tickMs = Number.isFinite(tickMsRaw) && tickMsRaw > 0 ? tickMsRaw : DEFAULT_TICK_MS;

const storage = new FileWorldStorage(worldDir);
const host = new InMemoryFactionHost();
if (!WorldSeedLoader.load(storage, host)) {
  Logger.log(`No world seed in ${worldDir}; starting with an empty world`, 'warning');
}

const session = new AllianceSession({ host, storage });
const { config } = session.init();
host.setThresholds(config);

const coordinator = new AllianceCoordinator(session, new ConsoleChatChannel());

function handleLine(raw: string): void {
  const line = raw.trim();
  if (line.length === 0) return;
  try {
    if (line.startsWith('!')) {
      runHostCommand(host, line);
      return;
    }
    const sep = line.indexOf(':');
    if (sep < 0) {
      Logger.log('expected "<handle>: <message>"', 'warning');
      return;
    }
    const handle = line.slice(0, sep).trim();
    const text = line.slice(sep + 1).trim();
    if (!coordinator.handleMessage(handle, text)) {
      console.log(`${handle}: ${text}`);
    }
  } catch (err) {
    Logger.log(`Input '${line}' failed: ${Logger.describe(err)}`, 'error');
  }
}

const timer = setInterval(() => session.tick(), tickMs);
const input = readline.createInterface({ input: process.stdin, terminal: false });
input.on('line', handleLine);
input.on('close', () => {
  clearInterval(timer);
  session.teardown();
});
