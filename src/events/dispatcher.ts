import type { RuntimeContext } from '../context.js';
import type { LoggerLike } from '../logging/logger-like.js';
import type { CoreNotifications } from './notifications.js';

export type NotificationCallback<P> = (ctx: RuntimeContext, payload: P) => Promise<void> | void;

type RouteTable<M> = { [K in keyof M]?: Array<NotificationCallback<M[K]>> };

export type DispatcherOptions = {
  log?: LoggerLike;
};

/**
 * Routes typed notifications to the callbacks registered for their kind.
 *
 * `M` maps each notification kind to its payload type. Widen it to route
 * additional kinds through the same instance:
 *
 * ```ts
 * const dispatcher = new EventDispatcher<CoreNotifications & { guildJoin: { guildId: string } }>(ctx);
 * dispatcher.on('guildJoin', (ctx, e) => ...);
 * ```
 *
 * Dispatch is detach-and-forget: each callback runs in its own promise, the
 * caller never waits for it, and a failure is logged without affecting the
 * other callbacks or the notification source. `idle()` drains outstanding
 * callbacks for shutdown and tests.
 */
export class EventDispatcher<M extends object = CoreNotifications> {
  private readonly routes: RouteTable<M> = {};
  private readonly inFlight = new Set<Promise<void>>();
  private readonly log?: LoggerLike;

  constructor(
    private readonly context: RuntimeContext,
    opts: DispatcherOptions = {},
  ) {
    this.log = opts.log ?? context.log;
  }

  /** Register a callback for `kind`. Registration is append-only. */
  on<K extends keyof M>(kind: K, callback: NotificationCallback<M[K]>): this {
    const list: Array<NotificationCallback<M[K]>> = this.routes[kind] ?? [];
    list.push(callback);
    this.routes[kind] = list;
    return this;
  }

  listenerCount(kind: keyof M): number {
    return this.routes[kind]?.length ?? 0;
  }

  /** Number of callbacks still running. */
  get pending(): number {
    return this.inFlight.size;
  }

  /**
   * Start every callback registered for `kind`. Returns how many were started;
   * never throws and never waits for them.
   */
  dispatch<K extends keyof M>(kind: K, payload: M[K]): number {
    const callbacks = this.routes[kind];
    if (!callbacks || callbacks.length === 0) return 0;

    for (const callback of callbacks) {
      const task = Promise.resolve()
        .then(() => callback(this.context, payload))
        .catch((err: unknown) => {
          this.log?.error({ err, kind: String(kind) }, 'dispatch:callback failed');
        });
      this.inFlight.add(task);
      void task.finally(() => this.inFlight.delete(task));
    }
    return callbacks.length;
  }

  /** Resolves once no callback is running, including ones started meanwhile. */
  async idle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }
}
