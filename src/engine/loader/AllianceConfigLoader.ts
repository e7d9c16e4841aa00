// ─────────────────────────────────────────────
//  AllianceConfigLoader
//  Reads the per-world `key = value` config file.
//  A missing file is replaced by a commented default; any read
//  failure falls back to defaults so the world still loads.
// ─────────────────────────────────────────────

import { z } from 'zod';
import { CONFIG_FILE_NAME } from '@/config';
import {
  createAllianceConfig,
  DEFAULT_ALLIANCE_CONFIG,
  type AllianceConfig,
} from '@/engine/alliance/data/types/AllianceConfig';
import { Logger } from '@/engine/utils/Logger';
import type { IWorldStorage } from './WorldStorage';

// ── Value schemas ──

const IntValue = z
  .string()
  .regex(/^[+-]?\d+$/, 'expected an integer')
  .transform(Number)
  .pipe(z.number().int().safe());

const BoolValue = z
  .string()
  .transform(v => v.toLowerCase())
  .pipe(z.enum(['true', 'false'], { errorMap: () => ({ message: 'expected true or false' }) }))
  .transform(v => v === 'true');

const TagList = z
  .string()
  .transform(v => v.split(',').map(t => t.trim()).filter(t => t.length > 0));

/** Applies one raw value; returns an error message or null. */
type KeyHandler = (config: AllianceConfig, raw: string) => string | null;

function assign<K extends keyof AllianceConfig>(
  field: K,
  schema: z.ZodType<AllianceConfig[K], z.ZodTypeDef, string>,
): KeyHandler {
  return (config, raw) => {
    const result = schema.safeParse(raw);
    if (!result.success) return result.error.issues[0]?.message ?? 'invalid value';
    config[field] = result.data;
    return null;
  };
}

/** Keys are matched case-insensitively. */
const KEY_HANDLERS: Record<string, KeyHandler> = {
  factions:               assign('factions', TagList),
  allyreputation:         assign('allyReputation', IntValue),
  enemyreputation:        assign('enemyReputation', IntValue),
  defaultreputation:      assign('defaultReputation', IntValue),
  allowonlynpcfactions:   assign('allowOnlyNpcFactions', BoolValue),
  twophasedefault:        assign('twoPhaseDefault', BoolValue),
  twophaseseedreputation: assign('twoPhaseSeedReputation', IntValue),
  hostilethreshold:       assign('hostileThreshold', IntValue),
  friendlythreshold:      assign('friendlyThreshold', IntValue),
};

export interface ConfigParseResult {
  config: AllianceConfig;
  warnings: string[];
}

function isComment(line: string): boolean {
  return line.startsWith('#') || line.startsWith('//');
}

/** Parse config text. Unknown keys are ignored; invalid values keep their default. */
export function parseAllianceConfig(text: string): ConfigParseResult {
  const config = createAllianceConfig();
  const warnings: string[] = [];

  text.split(/\r?\n/).forEach((rawLine, index) => {
    const line = rawLine.trim();
    if (line.length === 0 || isComment(line)) return;

    const eq = line.indexOf('=');
    if (eq < 0) {
      warnings.push(`line ${index + 1}: expected 'key = value'`);
      return;
    }

    const key = line.slice(0, eq).trim();
    const value = line.slice(eq + 1).trim();
    const handler = KEY_HANDLERS[key.toLowerCase()];
    if (!handler) return;

    const error = handler(config, value);
    if (error) warnings.push(`line ${index + 1}: ${key}: ${error}`);
  });

  return { config, warnings };
}

/** Commented default file written when a world has no config yet. */
export function defaultConfigText(): string {
  const d = DEFAULT_ALLIANCE_CONFIG;
  return [
    '# Faction Alliance Configuration',
    '# ------------------------------',
    '# Comma-separated list of faction tags player factions can align with.',
    '# These MUST be set for alliances to be available.',
    '# Example: Factions = SOBAN, KHAANEPH',
    'Factions = ',
    '',
    `# Reputation granted towards the chosen ally faction (default: ${d.allyReputation})`,
    `AllyReputation = ${d.allyReputation}`,
    '',
    `# Reputation set towards every OTHER configured faction (default: ${d.enemyReputation})`,
    `EnemyReputation = ${d.enemyReputation}`,
    '',
    `# Reputation new player factions start with towards every configured faction (default: ${d.defaultReputation})`,
    `DefaultReputation = ${d.defaultReputation}`,
    '',
    `# Only NPC factions can be chosen (default: ${d.allowOnlyNpcFactions})`,
    '# Stops players forcing relationships with other player factions.',
    `AllowOnlyNpcFactions = ${d.allowOnlyNpcFactions}`,
    '',
    '# Write a strongly negative seed first and the default one tick later,',
    '# for hosts whose relation lags behind the numeric value (default: false)',
    `TwoPhaseDefault = ${d.twoPhaseDefault}`,
    `TwoPhaseSeedReputation = ${d.twoPhaseSeedReputation}`,
    '',
    '# Where the host switches between enemy / neutral / ally',
    `HostileThreshold = ${d.hostileThreshold}`,
    `FriendlyThreshold = ${d.friendlyThreshold}`,
    '',
  ].join('\n');
}

export const AllianceConfigLoader = {
  /** Load the world's config, creating the default file when missing. */
  load(storage: IWorldStorage, fileName: string = CONFIG_FILE_NAME): AllianceConfig {
    try {
      if (!storage.exists(fileName)) {
        writeDefault(storage, fileName);
        return createAllianceConfig();
      }

      const { config, warnings } = parseAllianceConfig(storage.read(fileName));
      for (const w of warnings) Logger.log(`${fileName} ${w}`, 'warning');
      Logger.log(`Configuration loaded from ${fileName}`, 'system');
      return config;
    } catch (err) {
      Logger.log(`Error loading config: ${Logger.describe(err)}`, 'error');
      return createAllianceConfig();
    }
  },
};

function writeDefault(storage: IWorldStorage, fileName: string): void {
  try {
    storage.write(fileName, defaultConfigText());
    Logger.log(`Default configuration created at ${fileName}`, 'system');
  } catch (err) {
    Logger.log(`Error saving default config: ${Logger.describe(err)}`, 'error');
  }
}
