import { Routes } from 'discord.js';
import type { Client } from 'discord.js';
import type { MessageIdentity } from '../core/message-identity.js';
import type { MessageContent, MessageRef, MessagingClient, UserRef } from './types.js';

export type DiscordRestLike = Pick<Client['rest'], 'get' | 'post' | 'put' | 'patch' | 'delete'>;

/** Suppress all pings from menu content. */
const NO_MENTIONS: { parse: string[] } = { parse: [] };

const MAX_LIST_LIMIT = 100;

const CUSTOM_EMOJI_RE = /^<(a?):(\w+):(\d+)>$/;

/**
 * Route segment for an emoji: `name:id` for custom emoji, URL-encoded
 * otherwise.
 */
export function encodeEmojiForRoute(emoji: string): string {
  const custom = CUSTOM_EMOJI_RE.exec(emoji);
  if (custom) return `${custom[2]}:${custom[3]}`;
  return encodeURIComponent(emoji);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readMessageRef(raw: unknown): MessageRef {
  if (!isRecord(raw)) throw new Error('Discord returned a malformed message payload');
  const { id, channel_id: channelId, author } = raw;
  if (typeof id !== 'string' || typeof channelId !== 'string' || !isRecord(author) || typeof author.id !== 'string') {
    throw new Error('Discord returned a message without id, channel_id or author');
  }
  return { identity: { channelId, messageId: id }, authorId: author.id };
}

export function readUserRef(raw: unknown): UserRef {
  if (!isRecord(raw) || typeof raw.id !== 'string') {
    throw new Error('Discord returned a malformed user payload');
  }
  return {
    id: raw.id,
    username: typeof raw.username === 'string' ? raw.username : '',
    bot: raw.bot === true,
  };
}

function sendBody(content: MessageContent) {
  return {
    ...(content.content !== undefined ? { content: content.content } : {}),
    ...(content.embeds !== undefined ? { embeds: content.embeds } : {}),
    allowed_mentions: NO_MENTIONS,
  };
}

// An edit replaces both fields so nothing from the previous page lingers.
function editBody(content: MessageContent) {
  return {
    content: content.content ?? '',
    embeds: content.embeds ?? [],
    allowed_mentions: NO_MENTIONS,
  };
}

function compareMessageIds(a: MessageRef, b: MessageRef): number {
  const x = BigInt(a.identity.messageId);
  const y = BigInt(b.identity.messageId);
  return x === y ? 0 : x < y ? -1 : 1;
}

/**
 * MessagingClient over the discord.js REST manager. Errors from discord.js
 * (DiscordAPIError, HTTPError, network errors) propagate unchanged.
 */
export class DiscordMessagingClient implements MessagingClient {
  private self: UserRef | null = null;

  constructor(private readonly rest: DiscordRestLike) {}

  static fromClient(client: Client): DiscordMessagingClient {
    const messaging = new DiscordMessagingClient(client.rest);
    if (client.user) {
      messaging.self = { id: client.user.id, username: client.user.username, bot: client.user.bot };
    }
    return messaging;
  }

  async sendMessage(channelId: string, content: MessageContent): Promise<MessageRef> {
    const raw = await this.rest.post(Routes.channelMessages(channelId), { body: sendBody(content) });
    return readMessageRef(raw);
  }

  async editMessage(identity: MessageIdentity, content: MessageContent): Promise<void> {
    await this.rest.patch(Routes.channelMessage(identity.channelId, identity.messageId), { body: editBody(content) });
  }

  async deleteMessage(identity: MessageIdentity): Promise<void> {
    await this.rest.delete(Routes.channelMessage(identity.channelId, identity.messageId));
  }

  async addReaction(identity: MessageIdentity, emoji: string): Promise<void> {
    await this.rest.put(
      Routes.channelMessageOwnReaction(identity.channelId, identity.messageId, encodeEmojiForRoute(emoji)),
    );
  }

  async removeAllReactions(identity: MessageIdentity): Promise<void> {
    await this.rest.delete(Routes.channelMessageAllReactions(identity.channelId, identity.messageId));
  }

  async removeReaction(identity: MessageIdentity, emoji: string, userId: string): Promise<void> {
    await this.rest.delete(
      Routes.channelMessageUserReaction(identity.channelId, identity.messageId, encodeEmojiForRoute(emoji), userId),
    );
  }

  async listMessagesAfter(channelId: string, after: MessageIdentity, limit: number): Promise<MessageRef[]> {
    const clamped = Math.min(Math.max(1, Math.trunc(limit)), MAX_LIST_LIMIT);
    const raw = await this.rest.get(Routes.channelMessages(channelId), {
      query: new URLSearchParams({ after: after.messageId, limit: String(clamped) }),
    });
    if (!Array.isArray(raw)) throw new Error('Discord returned a malformed message list');
    return raw.map(readMessageRef).sort(compareMessageIds);
  }

  async currentUser(): Promise<UserRef> {
    if (this.self) return this.self;
    this.self = readUserRef(await this.rest.get(Routes.user()));
    return this.self;
  }
}
