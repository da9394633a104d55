import { MessageRegistry } from './core/registry.js';
import { PeriodicSweeper, DEFAULT_SWEEP_INTERVAL_MS } from './core/sweeper.js';
import { EventDispatcher } from './events/dispatcher.js';
import { registerDefaultRoutes } from './events/default-routes.js';
import type { RuntimeContext } from './context.js';
import type { CoreNotifications } from './events/notifications.js';
import type { MessagingClient } from './transport/types.js';
import type { LoggerLike } from './logging/logger-like.js';

export type RuntimeOptions = {
  client: MessagingClient;
  log?: LoggerLike;
  sweepIntervalMs?: number;
};

export type Runtime = {
  context: RuntimeContext;
  registry: MessageRegistry;
  dispatcher: EventDispatcher<CoreNotifications>;
  sweeper: PeriodicSweeper;
};

/**
 * Build the registry, sweeper and dispatcher once per process and wire the
 * built-in routes. To route extra notification kinds, construct an
 * `EventDispatcher` over a wider map and call `registerDefaultRoutes` on it.
 */
export function createRuntime(opts: RuntimeOptions): Runtime {
  const registry = new MessageRegistry();
  const context: RuntimeContext = { client: opts.client, registry, log: opts.log };
  const sweeper = new PeriodicSweeper({
    context,
    intervalMs: opts.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS,
    log: opts.log,
  });
  const dispatcher = new EventDispatcher<CoreNotifications>(context, { log: opts.log });
  registerDefaultRoutes(dispatcher, sweeper);
  return { context, registry, dispatcher, sweeper };
}
