#!/usr/bin/env node
import 'dotenv/config';
import pino from 'pino';
import { Client, GatewayIntentBits, Partials } from 'discord.js';

import { parseConfig } from './config.js';
import type { ReactionMenusConfig } from './config.js';
import { createRuntime } from './runtime.js';
import { createDemoCommandHandler } from './demo-commands.js';
import { bindDiscordGateway } from './transport/discord-gateway.js';
import { DiscordMessagingClient } from './transport/discord-messaging-client.js';

const log = pino({ level: process.env.LOG_LEVEL ?? 'info' });

function loadConfig(): ReactionMenusConfig {
  try {
    const parsed = parseConfig(process.env);
    for (const warning of parsed.warnings) log.warn(warning);
    for (const info of parsed.infos) log.info(info);
    return parsed.config;
  } catch (err) {
    log.error({ err }, 'Invalid configuration');
    process.exit(1);
  }
}

const cfg = loadConfig();
log.level = cfg.logLevel;

const client = new Client({
  intents: [
    GatewayIntentBits.Guilds,
    GatewayIntentBits.GuildMessages,
    GatewayIntentBits.GuildMessageReactions,
    ...(cfg.demoCommandsEnabled ? [GatewayIntentBits.MessageContent] : []),
  ],
  // Reactions and deletes on messages sent before this process started
  // arrive as partials.
  partials: [Partials.Message, Partials.Reaction, Partials.User, Partials.Channel],
});

const runtime = createRuntime({
  client: DiscordMessagingClient.fromClient(client),
  log,
  sweepIntervalMs: cfg.sweepIntervalMs,
});
bindDiscordGateway(client, runtime.dispatcher, log);

if (cfg.demoCommandsEnabled) {
  const handleDemoCommand = createDemoCommandHandler({
    context: runtime.context,
    menuTimeoutMs: cfg.menuTimeoutMs,
    ephemeralDelayMs: cfg.ephemeralDelayMs,
    restrictChannels: cfg.restrictDemoChannels,
    channelIds: cfg.demoChannelIds,
  });
  client.on('messageCreate', (message) => {
    void handleDemoCommand(message);
  });
}

let shuttingDown = false;
async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  log.info({ signal, menus: runtime.registry.size }, 'shutdown:begin');
  try {
    await runtime.sweeper.stop();
    await runtime.dispatcher.idle();
    await client.destroy();
  } catch (err) {
    log.warn({ err }, 'shutdown:error while closing');
  }
  log.info('shutdown:complete');
  process.exit(0);
}

process.on('SIGINT', () => { void shutdown('SIGINT'); });
process.on('SIGTERM', () => { void shutdown('SIGTERM'); });

try {
  await client.login(cfg.token);
} catch (err) {
  log.error({ err }, 'discord:login failed');
  process.exit(1);
}
