import { DEFAULT_SWEEP_INTERVAL_MS } from './core/sweeper.js';
import { DEFAULT_MENU_TIMEOUT_MS } from './menu/menu-builder.js';
import { DEFAULT_EPHEMERAL_DELAY_MS } from './ephemeral/ephemeral-message.js';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

/** Sweeps faster than this hammer the REST rate limits for sticky menus. */
export const MIN_RECOMMENDED_SWEEP_INTERVAL_MS = 1_000;

type ParseResult = {
  config: ReactionMenusConfig;
  warnings: string[];
  infos: string[];
};

export type ReactionMenusConfig = {
  token: string;
  logLevel: LogLevel;
  sweepIntervalMs: number;
  menuTimeoutMs: number;
  ephemeralDelayMs: number;
  demoCommandsEnabled: boolean;
  /** When true, demo commands answer only in demoChannelIds. */
  restrictDemoChannels: boolean;
  demoChannelIds: Set<string>;
};

function parseBoolean(
  env: NodeJS.ProcessEnv,
  name: string,
  defaultValue: boolean,
): boolean {
  const raw = env[name];
  if (raw == null || raw.trim() === '') return defaultValue;
  const normalized = raw.trim().toLowerCase();
  if (normalized === '1' || normalized === 'true') return true;
  if (normalized === '0' || normalized === 'false') return false;
  throw new Error(`${name} must be "0"/"1" or "true"/"false", got "${raw}"`);
}

function parsePositiveInt(
  env: NodeJS.ProcessEnv,
  name: string,
  defaultValue: number,
): number {
  const raw = env[name];
  if (raw == null || raw.trim() === '') return defaultValue;
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) {
    throw new Error(`${name} must be a positive integer, got "${raw}"`);
  }
  return n;
}

function parseTrimmedString(
  env: NodeJS.ProcessEnv,
  name: string,
): string | undefined {
  const raw = env[name];
  if (raw == null) return undefined;
  const trimmed = raw.trim();
  return trimmed || undefined;
}

function parseEnum<T extends string>(
  env: NodeJS.ProcessEnv,
  name: string,
  validValues: readonly T[],
  defaultValue: T,
): T {
  const raw = env[name];
  if (raw == null || raw.trim() === '') return defaultValue;
  const normalized = raw.trim().toLowerCase();
  const match = validValues.find((v) => v === normalized);
  if (!match) {
    throw new Error(`${name} must be one of ${validValues.join('|')}, got "${raw}"`);
  }
  return match;
}

export function parseSnowflakeList(raw: string | undefined): Set<string> {
  const out = new Set<string>();
  for (const part of String(raw ?? '').split(/[,\s]+/g)) {
    const v = part.trim();
    if (/^\d+$/.test(v)) out.add(v);
  }
  return out;
}

export function parseConfig(env: NodeJS.ProcessEnv): ParseResult {
  const warnings: string[] = [];
  const infos: string[] = [];

  const token = parseTrimmedString(env, 'DISCORD_TOKEN');
  if (!token) {
    throw new Error('Missing DISCORD_TOKEN');
  }

  const logLevel = parseEnum(env, 'LOG_LEVEL', LOG_LEVELS, 'info');

  const sweepIntervalMs = parsePositiveInt(env, 'MENU_SWEEP_INTERVAL_MS', DEFAULT_SWEEP_INTERVAL_MS);
  if (sweepIntervalMs < MIN_RECOMMENDED_SWEEP_INTERVAL_MS) {
    warnings.push(
      `MENU_SWEEP_INTERVAL_MS=${sweepIntervalMs} is below ${MIN_RECOMMENDED_SWEEP_INTERVAL_MS}ms: ` +
      'sticky menus will poll their channels often enough to hit rate limits',
    );
  }

  const menuTimeoutMs = parsePositiveInt(env, 'MENU_DEFAULT_TIMEOUT_MS', DEFAULT_MENU_TIMEOUT_MS);
  if (menuTimeoutMs < sweepIntervalMs) {
    warnings.push(
      `MENU_DEFAULT_TIMEOUT_MS (${menuTimeoutMs}) is shorter than MENU_SWEEP_INTERVAL_MS (${sweepIntervalMs}): ` +
      'menus close on the first sweep after they are built',
    );
  }

  const ephemeralDelayMs = parsePositiveInt(env, 'EPHEMERAL_DEFAULT_DELAY_MS', DEFAULT_EPHEMERAL_DELAY_MS);
  const demoCommandsEnabled = parseBoolean(env, 'MENU_DEMO_COMMANDS', true);

  const demoChannelIdsRaw = env.DISCORD_CHANNEL_IDS;
  const restrictDemoChannels = (demoChannelIdsRaw ?? '').trim().length > 0;
  const demoChannelIds = parseSnowflakeList(demoChannelIdsRaw);
  if (restrictDemoChannels && demoChannelIds.size === 0) {
    warnings.push('DISCORD_CHANNEL_IDS was set but no valid IDs were parsed: demo commands will answer nowhere');
  } else if (demoCommandsEnabled && demoChannelIds.size === 0) {
    infos.push('DISCORD_CHANNEL_IDS is empty: demo commands answer in every channel');
  }

  return {
    config: {
      token,
      logLevel,
      sweepIntervalMs,
      menuTimeoutMs,
      ephemeralDelayMs,
      demoCommandsEnabled,
      restrictDemoChannels,
      demoChannelIds,
    },
    warnings,
    infos,
  };
}
