import type { RuntimeContext } from '../context.js';
import type { MessageIdentity } from '../core/message-identity.js';
import { MEDIUM_TIMEOUT_MS } from '../core/timeouts.js';
import type { MessageContent, MessageRef } from '../transport/types.js';

export const DEFAULT_EPHEMERAL_DELAY_MS = MEDIUM_TIMEOUT_MS;

export type ScheduledDeletion = {
  identity: MessageIdentity;
  deletesAt: Date;
  /** Cancel the pending deletion. Returns false if it already ran or was cancelled. */
  cancel: () => boolean;
};

/** Delete an existing message after `delayMs`. Failures are logged. */
export function scheduleDeletion(
  ctx: RuntimeContext,
  identity: MessageIdentity,
  delayMs: number = DEFAULT_EPHEMERAL_DELAY_MS,
): ScheduledDeletion {
  if (!Number.isFinite(delayMs) || delayMs < 0) {
    throw new Error(`delayMs must be a non-negative number, got ${delayMs}`);
  }

  let pending = true;
  const runDeletion = async () => {
    pending = false;
    try {
      await ctx.client.deleteMessage(identity);
      ctx.log?.debug({ ...identity }, 'ephemeral:deleted');
    } catch (err) {
      ctx.log?.error({ err, ...identity }, 'ephemeral:failed to delete message');
    }
  };
  const timer = setTimeout(() => { void runDeletion(); }, delayMs);

  return {
    identity,
    deletesAt: new Date(Date.now() + delayMs),
    cancel: () => {
      if (!pending) return false;
      pending = false;
      clearTimeout(timer);
      return true;
    },
  };
}

/** Send `content` to `channelId` and delete it after `delayMs`. */
export async function sendEphemeral(
  ctx: RuntimeContext,
  channelId: string,
  content: MessageContent,
  delayMs: number = DEFAULT_EPHEMERAL_DELAY_MS,
): Promise<{ message: MessageRef; deletion: ScheduledDeletion }> {
  const message = await ctx.client.sendMessage(channelId, content);
  return { message, deletion: scheduleDeletion(ctx, message.identity, delayMs) };
}
