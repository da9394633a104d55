import type { APIEmbed } from 'discord.js';
import type { MessageIdentity } from '../core/message-identity.js';

/** Renderable message body. At least one of the fields should be set. */
export type MessageContent = {
  content?: string;
  embeds?: APIEmbed[];
};

export type MessageRef = {
  identity: MessageIdentity;
  authorId: string;
};

export type UserRef = {
  id: string;
  username: string;
  bot: boolean;
};

/**
 * Chat-platform operations the core needs. The discord.js implementation lives
 * in discord-messaging-client.ts; tests use the in-process fake.
 */
export interface MessagingClient {
  sendMessage(channelId: string, content: MessageContent): Promise<MessageRef>;
  editMessage(identity: MessageIdentity, content: MessageContent): Promise<void>;
  deleteMessage(identity: MessageIdentity): Promise<void>;
  addReaction(identity: MessageIdentity, emoji: string): Promise<void>;
  removeAllReactions(identity: MessageIdentity): Promise<void>;
  removeReaction(identity: MessageIdentity, emoji: string, userId: string): Promise<void>;
  /** Messages posted in `channelId` after `after`, oldest first, at most `limit`. */
  listMessagesAfter(channelId: string, after: MessageIdentity, limit: number): Promise<MessageRef[]>;
  currentUser(): Promise<UserRef>;
}
