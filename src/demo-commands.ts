import type { RuntimeContext } from './context.js';
import { sendEphemeral } from './ephemeral/ephemeral-message.js';
import { MenuBuilder } from './menu/menu-builder.js';
import { embedPage } from './menu/page.js';
import type { Page } from './menu/page.js';

export type DemoCommand =
  | { name: 'pages'; sticky: boolean }
  | { name: 'flash'; text: string };

type DemoMessageLike = {
  content: string;
  channelId: string;
  author: { id: string; bot: boolean };
};

export type DemoCommandOptions = {
  context: RuntimeContext;
  menuTimeoutMs: number;
  ephemeralDelayMs: number;
  restrictChannels: boolean;
  channelIds: Set<string>;
};

export function parseDemoCommand(content: string): DemoCommand | null {
  const trimmed = content.trim();
  const match = /^!(pages|flash)(?:\s+([\s\S]*))?$/i.exec(trimmed);
  if (!match) return null;
  const name = match[1].toLowerCase();
  const rest = (match[2] ?? '').trim();
  if (name === 'pages') return { name: 'pages', sticky: rest.toLowerCase() === 'sticky' };
  if (!rest) return null;
  return { name: 'flash', text: rest };
}

export function demoPages(): Page[] {
  return [
    embedPage({
      title: 'Reaction menus (1/3)',
      description: 'Use ⬅️ and ➡️ to move between pages. ❌ removes the buttons.',
    }),
    embedPage({
      title: 'Reaction menus (2/3)',
      description: 'Only the person who opened this menu can drive it. Other reactions are removed.',
    }),
    () => ({
      embeds: [{
        title: 'Reaction menus (3/3)',
        description: `Rendered <t:${Math.floor(Date.now() / 1000)}:T>. Pages are rebuilt every time they are shown.`,
      }],
    }),
  ];
}

/**
 * `!pages [sticky]` opens an owner-restricted paginator, `!flash <text>` posts
 * a message that deletes itself.
 */
export function createDemoCommandHandler(opts: DemoCommandOptions): (message: DemoMessageLike) => Promise<void> {
  const { context } = opts;
  return async (message) => {
    if (message.author.bot) return;
    if (opts.restrictChannels && !opts.channelIds.has(message.channelId)) return;

    const command = parseDemoCommand(message.content);
    if (!command) return;

    try {
      if (command.name === 'pages') {
        const handle = await MenuBuilder.paginator()
          .addPages(demoPages())
          .showHelp()
          .owner(message.author.id)
          .sticky(command.sticky)
          .timeout(opts.menuTimeoutMs)
          .build(context, message.channelId);
        context.log?.info({ ...handle.get(), sticky: command.sticky }, 'demo:menu opened');
      } else {
        await sendEphemeral(context, message.channelId, { content: command.text }, opts.ephemeralDelayMs);
      }
    } catch (err) {
      context.log?.warn({ err, command: command.name, channelId: message.channelId }, 'demo:command failed');
    }
  };
}
