import { duplicateListener, lostListener } from '../errors.js';
import { identityKey } from './message-identity.js';
import type { MessageIdentity } from './message-identity.js';
import type { ListenerHandle } from './listener.js';

export type RegistryEntry = {
  identity: MessageIdentity;
  handle: ListenerHandle;
};

/**
 * Process-wide mapping from message identity to its live listener.
 *
 * Every operation is synchronous and never touches a listener's own lock.
 */
export class MessageRegistry {
  private readonly entries = new Map<string, RegistryEntry>();

  get size(): number {
    return this.entries.size;
  }

  /** Throws DUPLICATE_LISTENER rather than orphan the existing listener. */
  insert(identity: MessageIdentity, handle: ListenerHandle): void {
    const key = identityKey(identity);
    if (this.entries.has(key)) throw duplicateListener(key);
    this.entries.set(key, { identity, handle });
  }

  get(identity: MessageIdentity): ListenerHandle | undefined {
    return this.entries.get(identityKey(identity))?.handle;
  }

  has(identity: MessageIdentity): boolean {
    return this.entries.has(identityKey(identity));
  }

  remove(identity: MessageIdentity): ListenerHandle | undefined {
    const key = identityKey(identity);
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    this.entries.delete(key);
    return entry.handle;
  }

  /**
   * Move the entry at `from` to `to`. A missing `from` means the registry lost
   * track of a live listener and throws LOST_LISTENER.
   */
  rekey(from: MessageIdentity, to: MessageIdentity): void {
    const fromKey = identityKey(from);
    const toKey = identityKey(to);
    const entry = this.entries.get(fromKey);
    if (!entry) throw lostListener(fromKey);
    if (fromKey === toKey) return;
    if (this.entries.has(toKey)) throw duplicateListener(toKey);
    this.entries.delete(fromKey);
    this.entries.set(toKey, { identity: to, handle: entry.handle });
  }

  /** Where a handle is currently filed, if anywhere. */
  keyOf(handle: ListenerHandle): MessageIdentity | undefined {
    for (const entry of this.entries.values()) {
      if (entry.handle === handle) return entry.identity;
    }
    return undefined;
  }

  /** Point-in-time copy of all entries; later mutations do not affect it. */
  snapshot(): RegistryEntry[] {
    return [...this.entries.values()].map((e) => ({ ...e }));
  }

  clear(): void {
    this.entries.clear();
  }
}
