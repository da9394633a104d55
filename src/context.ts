import { uninitialized } from './errors.js';
import type { MessageRegistry } from './core/registry.js';
import type { MessagingClient } from './transport/types.js';
import type { LoggerLike } from './logging/logger-like.js';

/**
 * Handed to every listener, control and dispatcher callback. The registry is
 * optional so a context built for ephemeral messages alone stays valid; menu
 * code goes through requireRegistry.
 */
export type RuntimeContext = {
  client: MessagingClient;
  registry?: MessageRegistry;
  log?: LoggerLike;
};

export function requireRegistry(ctx: RuntimeContext): MessageRegistry {
  if (!ctx.registry) throw uninitialized();
  return ctx.registry;
}
