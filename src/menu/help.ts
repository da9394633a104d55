import type { APIEmbedField } from 'discord.js';
import { DataKey } from './menu-data.js';
import { cloneContent } from './page.js';
import type { MessageContent } from '../transport/types.js';

export type HelpState = { shown: boolean };

/** Whether the help block is currently rendered on the menu message. */
export const HELP_STATE = new DataKey<HelpState>('help-state');

export const HELP_FIELD_NAME = 'Help';
const EMPTY_HELP = 'No controls are documented.';

export type HelpLine = {
  emoji: string;
  text: string;
  position: number;
};

/** One ` - <emoji> <text>` line per entry, lowest position first. */
export function formatHelpLines(lines: readonly HelpLine[]): string {
  return [...lines]
    .sort((a, b) => a.position - b.position)
    .map((l) => ` - ${l.emoji} ${l.text}`)
    .join('\n');
}

/**
 * Copy of `content` with a Help field appended to its first embed, or a new
 * embed carrying the field when the page has none.
 */
export function withHelpBlock(content: MessageContent, helpText: string): MessageContent {
  const field: APIEmbedField = { name: HELP_FIELD_NAME, value: helpText || EMPTY_HELP, inline: false };
  const next = cloneContent(content);
  const [first, ...rest] = next.embeds ?? [];
  if (first) {
    next.embeds = [{ ...first, fields: [...(first.fields ?? []), field] }, ...rest];
  } else {
    next.embeds = [{ fields: [field] }];
  }
  return next;
}
