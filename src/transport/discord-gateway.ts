import type { Client } from 'discord.js';
import type { EventDispatcher } from '../events/dispatcher.js';
import type {
  CoreNotifications,
  MessageBulkDeleteNotification,
  MessageDeleteNotification,
  ReactionNotification,
} from '../events/notifications.js';
import type { LoggerLike } from '../logging/logger-like.js';

type EmojiLike = {
  id: string | null;
  name: string | null;
  animated?: boolean | null;
};

type MessageLike = {
  id: string;
  channelId: string;
};

type ReactionLike = {
  emoji: EmojiLike;
  message: MessageLike;
};

type UserLike = { id: string } | null | undefined;

/**
 * Stable control key for an emoji: the unicode character itself, or
 * `<:name:id>` (`<a:name:id>` when animated) for custom emoji, the same form
 * discord.js accepts when reacting.
 */
export function emojiKey(emoji: EmojiLike): string {
  if (emoji.id) return `<${emoji.animated ? 'a' : ''}:${emoji.name ?? ''}:${emoji.id}>`;
  return emoji.name ?? '';
}

export function reactionNotificationFrom(
  reaction: ReactionLike,
  user: UserLike,
  botUserId: string | null,
): ReactionNotification {
  const userId = user?.id ?? null;
  return {
    identity: { channelId: reaction.message.channelId, messageId: reaction.message.id },
    emoji: emojiKey(reaction.emoji),
    userId,
    isCurrentUser: userId !== null && botUserId !== null && userId === botUserId,
  };
}

export function deleteNotificationFrom(message: MessageLike): MessageDeleteNotification {
  return { identity: { channelId: message.channelId, messageId: message.id } };
}

export function bulkDeleteNotificationFrom(messageIds: Iterable<string>, channelId: string): MessageBulkDeleteNotification {
  return {
    identities: [...messageIds].map((messageId) => ({ channelId, messageId })),
  };
}

/**
 * Forward the gateway events the core cares about into the dispatcher. The
 * client needs the GuildMessageReactions intent and the Message, Reaction and
 * User partials to see reactions on uncached messages.
 */
export function bindDiscordGateway(
  client: Client,
  dispatcher: EventDispatcher<CoreNotifications>,
  log?: LoggerLike,
): void {
  client.once('ready', (ready) => {
    log?.info({ userId: ready.user.id, tag: ready.user.tag }, 'gateway:ready');
    dispatcher.dispatch('ready', { userId: ready.user.id });
  });

  client.on('messageReactionAdd', (reaction, user) => {
    dispatcher.dispatch('reactionAdd', reactionNotificationFrom(reaction, user, client.user?.id ?? null));
  });

  client.on('messageReactionRemove', (reaction, user) => {
    dispatcher.dispatch('reactionRemove', reactionNotificationFrom(reaction, user, client.user?.id ?? null));
  });

  client.on('messageDelete', (message) => {
    dispatcher.dispatch('messageDelete', deleteNotificationFrom(message));
  });

  client.on('messageDeleteBulk', (messages, channel) => {
    dispatcher.dispatch('messageDeleteBulk', bulkDeleteNotificationFrom(messages.keys(), channel.id));
  });
}
