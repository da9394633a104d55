import { requireRegistry } from '../context.js';
import type { RuntimeContext } from '../context.js';
import type { MessageIdentity } from '../core/message-identity.js';
import type { ListenerHandle } from '../core/listener.js';
import type { PeriodicSweeper } from '../core/sweeper.js';
import type { EventDispatcher } from './dispatcher.js';
import type { CoreNotifications, ReactionNotification } from './notifications.js';

/**
 * Built-in routes:
 * - ready starts the sweeper (idempotent)
 * - reaction add/remove forward to the listener filed under the reacted message
 * - single and bulk deletes evict the listeners, then notify them
 */
export function registerDefaultRoutes<M extends CoreNotifications>(
  dispatcher: EventDispatcher<M>,
  sweeper: PeriodicSweeper,
): void {
  dispatcher
    .on('ready', (ctx, ready) => {
      if (sweeper.start()) {
        ctx.log?.info({ userId: ready.userId }, 'dispatch:ready, sweeper started');
      }
    })
    .on('reactionAdd', async (ctx, reaction) => { await routeReaction(ctx, reaction, 'add'); })
    .on('reactionRemove', async (ctx, reaction) => { await routeReaction(ctx, reaction, 'remove'); })
    .on('messageDelete', async (ctx, deleted) => { await routeDeleted(ctx, [deleted.identity]); })
    .on('messageDeleteBulk', async (ctx, deleted) => { await routeDeleted(ctx, deleted.identities); });
}

export async function routeReaction(
  ctx: RuntimeContext,
  reaction: ReactionNotification,
  mode: 'add' | 'remove',
): Promise<boolean> {
  const handle = requireRegistry(ctx).get(reaction.identity);
  if (!handle) return false;
  if (mode === 'add') {
    await handle.reactionAdded(ctx, reaction);
  } else {
    await handle.reactionRemoved(ctx, reaction);
  }
  return true;
}

/**
 * Remove every affected entry first, then call onDeleted on each removed
 * listener. No registry state is held while the listeners run, so onDeleted
 * may use the registry freely. Every listener is notified even if an earlier
 * one fails; failures are rethrown together afterwards.
 */
export async function routeDeleted(ctx: RuntimeContext, identities: readonly MessageIdentity[]): Promise<number> {
  const registry = requireRegistry(ctx);
  const removed: Array<{ identity: MessageIdentity; handle: ListenerHandle }> = [];
  for (const identity of identities) {
    const handle = registry.remove(identity);
    if (handle) removed.push({ identity, handle });
  }

  const failures: unknown[] = [];
  for (const { identity, handle } of removed) {
    try {
      await handle.deleted(ctx);
      ctx.log?.debug({ ...identity }, 'dispatch:listener removed after message delete');
    } catch (err) {
      failures.push(err);
    }
  }

  if (failures.length === 1) throw failures[0];
  if (failures.length > 1) {
    throw new AggregateError(failures, `${failures.length} listeners failed to handle message deletion`);
  }
  return removed.length;
}
