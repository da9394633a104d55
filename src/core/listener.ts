import { ExclusiveLock } from './exclusive-lock.js';
import type { ReactionNotification } from '../events/notifications.js';
import type { RuntimeContext } from '../context.js';
import type { LoggerLike } from '../logging/logger-like.js';
import type { MessageIdentity } from './message-identity.js';

/**
 * Stateful object attached to one message. Every member is optional; the
 * handle supplies the no-op default for anything left out.
 */
export interface Listener {
  /** Finished listeners are evicted by the next sweep. */
  isFinished?(): boolean;
  /** Fired on every sweep pass. */
  onTick?(ctx: RuntimeContext): Promise<void>;
  /** Fired after the message was deleted and the entry removed. */
  onDeleted?(ctx: RuntimeContext): Promise<void>;
  onReactionAdded?(ctx: RuntimeContext, reaction: ReactionNotification): Promise<void>;
  onReactionRemoved?(ctx: RuntimeContext, reaction: ReactionNotification): Promise<void>;
}

/**
 * Shared ownership of one listener. Every call into the listener holds the
 * handle's lock for its full duration (including any I/O), so calls on the
 * same listener never interleave. Different handles never contend.
 */
export class ListenerHandle<L extends Listener = Listener> {
  private readonly lock = new ExclusiveLock();

  constructor(private readonly listener: L) {}

  /** True while a call into the listener is running or queued. */
  get busy(): boolean {
    return this.lock.isLocked;
  }

  withListener<T>(fn: (listener: L) => Promise<T> | T): Promise<T> {
    return this.lock.runExclusive(() => fn(this.listener));
  }

  isFinished(): Promise<boolean> {
    return this.withListener((l) => l.isFinished?.() ?? false);
  }

  tick(ctx: RuntimeContext): Promise<void> {
    return this.withListener(async (l) => { await l.onTick?.(ctx); });
  }

  deleted(ctx: RuntimeContext): Promise<void> {
    return this.withListener(async (l) => { await l.onDeleted?.(ctx); });
  }

  reactionAdded(ctx: RuntimeContext, reaction: ReactionNotification): Promise<void> {
    return this.withListener(async (l) => { await l.onReactionAdded?.(ctx, reaction); });
  }

  reactionRemoved(ctx: RuntimeContext, reaction: ReactionNotification): Promise<void> {
    return this.withListener(async (l) => { await l.onReactionRemoved?.(ctx, reaction); });
  }

  /**
   * Tick and read the finished flag under a single lock hold. A failing tick
   * is logged and the flag is still read.
   */
  tickAndCheck(ctx: RuntimeContext, identity: MessageIdentity, log?: LoggerLike): Promise<boolean> {
    return this.withListener(async (l) => {
      try {
        await l.onTick?.(ctx);
      } catch (err) {
        log?.error({ err, ...identity }, 'sweeper:tick failed');
      }
      return l.isFinished?.() ?? false;
    });
  }
}
