import { ExclusiveLock } from './exclusive-lock.js';
import type { MessageIdentity } from './message-identity.js';

/**
 * Shared, relocatable identity of a live message. The menu that owns the
 * message and any caller holding the handle returned by `MenuBuilder.build`
 * dereference through the same cell, so a relocation is visible to all of them.
 */
export class MessageIdentityCell {
  private current: MessageIdentity;
  private readonly lock = new ExclusiveLock();

  constructor(initial: MessageIdentity) {
    this.current = initial;
  }

  /** Current identity without waiting for an in-progress replace. */
  get(): MessageIdentity {
    return this.current;
  }

  /** Current identity, ordered after any replace already queued. */
  read(): Promise<MessageIdentity> {
    return this.lock.runExclusive(() => this.current);
  }

  /** Swap in a new identity; returns the previous one. */
  replace(next: MessageIdentity): Promise<MessageIdentity> {
    return this.lock.runExclusive(() => {
      const prev = this.current;
      this.current = next;
      return prev;
    });
  }
}
