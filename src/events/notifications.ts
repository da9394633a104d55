import type { MessageIdentity } from '../core/message-identity.js';

export type ReadyNotification = {
  /** The bot user's ID. */
  userId: string;
};

export type ReactionNotification = {
  identity: MessageIdentity;
  /** Unicode emoji, or `<:name:id>` / `<a:name:id>` for custom emoji. */
  emoji: string;
  /** Reacting user; null when the gateway delivered the reaction without one. */
  userId: string | null;
  /** True when the reaction was made by the bot itself. */
  isCurrentUser: boolean;
};

export type MessageDeleteNotification = {
  identity: MessageIdentity;
};

export type MessageBulkDeleteNotification = {
  identities: MessageIdentity[];
};

/** Notification kinds every dispatcher routes out of the box. */
export type CoreNotifications = {
  ready: ReadyNotification;
  reactionAdd: ReactionNotification;
  reactionRemove: ReactionNotification;
  messageDelete: MessageDeleteNotification;
  messageDeleteBulk: MessageBulkDeleteNotification;
};
