import type { APIEmbed } from 'discord.js';
import type { MessageContent } from '../transport/types.js';

/**
 * Produces the content of one page. Called again every time the page is
 * shown, so a page may render live data.
 */
export type Page = () => MessageContent | Promise<MessageContent>;

export function cloneContent(content: MessageContent): MessageContent {
  return structuredClone(content);
}

export function staticPage(content: MessageContent): Page {
  return () => cloneContent(content);
}

export function textPage(text: string): Page {
  return staticPage({ content: text });
}

export function embedPage(embed: APIEmbed): Page {
  return staticPage({ embeds: [embed] });
}
