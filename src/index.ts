export { ReactionMenusError, isReactionMenusError } from './errors.js';
export type { ReactionMenusErrorCode } from './errors.js';
export type { LoggerLike } from './logging/logger-like.js';

export {
  compareIdentities,
  identityKey,
  isSnowflake,
  messageIdentity,
  parseIdentityKey,
  sameIdentity,
} from './core/message-identity.js';
export type { MessageIdentity } from './core/message-identity.js';
export {
  EXTRA_LONG_TIMEOUT_MS,
  LONG_TIMEOUT_MS,
  MEDIUM_TIMEOUT_MS,
  SHORT_TIMEOUT_MS,
} from './core/timeouts.js';
export { ExclusiveLock } from './core/exclusive-lock.js';
export { MessageIdentityCell } from './core/identity-cell.js';
export { ListenerHandle } from './core/listener.js';
export type { Listener } from './core/listener.js';
export { MessageRegistry } from './core/registry.js';
export type { RegistryEntry } from './core/registry.js';
export { DEFAULT_SWEEP_INTERVAL_MS, PeriodicSweeper } from './core/sweeper.js';
export type { SweeperOptions } from './core/sweeper.js';

export { requireRegistry } from './context.js';
export type { RuntimeContext } from './context.js';
export { createRuntime } from './runtime.js';
export type { Runtime, RuntimeOptions } from './runtime.js';

export { EventDispatcher } from './events/dispatcher.js';
export type { DispatcherOptions, NotificationCallback } from './events/dispatcher.js';
export { registerDefaultRoutes, routeDeleted, routeReaction } from './events/default-routes.js';
export type {
  CoreNotifications,
  MessageBulkDeleteNotification,
  MessageDeleteNotification,
  ReactionNotification,
  ReadyNotification,
} from './events/notifications.js';

export type { MessageContent, MessageRef, MessagingClient, UserRef } from './transport/types.js';
export { DiscordMessagingClient, encodeEmojiForRoute } from './transport/discord-messaging-client.js';
export { bindDiscordGateway, emojiKey } from './transport/discord-gateway.js';

export { Menu } from './menu/menu.js';
export type { ControlRun, MenuAction } from './menu/menu.js';
export { DEFAULT_MENU_TIMEOUT_MS, MenuBuilder } from './menu/menu-builder.js';
export { DataKey, MenuData } from './menu/menu-data.js';
export { embedPage, staticPage, textPage } from './menu/page.js';
export type { Page } from './menu/page.js';
export { HELP_STATE } from './menu/help.js';
export type { HelpState } from './menu/help.js';
export {
  CLOSE_MENU_EMOJI,
  HELP_EMOJI,
  NEXT_PAGE_EMOJI,
  PREVIOUS_PAGE_EMOJI,
  closeMenu,
  nextPage,
  previousPage,
  toggleHelp,
} from './menu/controls.js';

export { DEFAULT_EPHEMERAL_DELAY_MS, scheduleDeletion, sendEphemeral } from './ephemeral/ephemeral-message.js';
export type { ScheduledDeletion } from './ephemeral/ephemeral-message.js';
