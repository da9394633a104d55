import { requireRegistry } from '../context.js';
import type { RuntimeContext } from '../context.js';
import type { LoggerLike } from '../logging/logger-like.js';
import type { MessageIdentity } from './message-identity.js';
import type { ListenerHandle } from './listener.js';
import type { MessageRegistry } from './registry.js';
import { SHORT_TIMEOUT_MS } from './timeouts.js';

export const DEFAULT_SWEEP_INTERVAL_MS = SHORT_TIMEOUT_MS;

export type SweeperOptions = {
  context: RuntimeContext;
  intervalMs?: number;
  log?: LoggerLike;
};

/**
 * Background loop that ticks every registered listener and evicts the ones
 * that report themselves finished. Passes start every `intervalMs`; a
 * listener still busy from an earlier call is skipped until a later pass, so
 * one stuck listener holds back neither the others nor the schedule.
 */
export class PeriodicSweeper {
  private readonly context: RuntimeContext;
  private readonly intervalMs: number;
  private readonly log?: LoggerLike;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private running = false;
  private readonly inFlight = new Set<Promise<void>>();

  constructor(opts: SweeperOptions) {
    this.context = opts.context;
    this.intervalMs = opts.intervalMs ?? DEFAULT_SWEEP_INTERVAL_MS;
    this.log = opts.log;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Start the loop; the first pass runs immediately. Returns false when the
   * loop was already running. Throws UNINITIALIZED without a registry.
   */
  start(): boolean {
    requireRegistry(this.context);
    if (this.running) return false;
    this.running = true;
    this.log?.info({ intervalMs: this.intervalMs }, 'sweeper:started');
    this.loop();
    return true;
  }

  /** Stop scheduling passes and wait for the ticks still running. */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    await Promise.all([...this.inFlight]);
    this.log?.info({}, 'sweeper:stopped');
  }

  /**
   * One pass: snapshot the registry, then tick every listener that is not
   * busy, each under its own lock and independently of the others. A
   * listener is evicted as soon as its own check reports it finished.
   * Resolves with the evicted identities once every started tick settles.
   */
  async sweep(): Promise<MessageIdentity[]> {
    const registry = requireRegistry(this.context);
    const evicted: MessageIdentity[] = [];
    let skipped = 0;

    const ticks: Array<Promise<void>> = [];
    for (const { identity, handle } of registry.snapshot()) {
      if (handle.busy) {
        skipped++;
        continue;
      }
      ticks.push(this.sweepOne(registry, identity, handle, evicted));
    }
    await Promise.allSettled(ticks);

    if (skipped > 0) {
      this.log?.debug({ skipped }, 'sweeper:skipped busy listeners');
    }
    if (evicted.length > 0) {
      this.log?.debug({ evicted: evicted.length, remaining: registry.size }, 'sweeper:evicted finished listeners');
    }
    return evicted;
  }

  private async sweepOne(
    registry: MessageRegistry,
    identity: MessageIdentity,
    handle: ListenerHandle,
    evicted: MessageIdentity[],
  ): Promise<void> {
    try {
      if (!(await handle.tickAndCheck(this.context, identity, this.log))) return;
    } catch (err) {
      this.log?.error({ err, ...identity }, 'sweeper:finished check failed');
      return;
    }
    // Look the handle up again: the tick may have relocated it.
    const current = registry.keyOf(handle);
    if (!current) return;
    registry.remove(current);
    evicted.push(current);
  }

  private loop(): void {
    const pass = this.sweep().then(
      () => undefined,
      (err: unknown) => {
        this.log?.error({ err }, 'sweeper:pass failed');
      },
    );
    this.inFlight.add(pass);
    void pass.finally(() => this.inFlight.delete(pass));

    if (!this.running) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      if (this.running) this.loop();
    }, this.intervalMs);
  }
}
