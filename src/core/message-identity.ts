// Identity of one message on the platform at a point in time. Snowflakes stay
// decimal strings end to end; a u64 does not survive a JS number.

export type MessageIdentity = {
  readonly channelId: string;
  readonly messageId: string;
};

const SNOWFLAKE_RE = /^\d+$/;

export function isSnowflake(value: string): boolean {
  return SNOWFLAKE_RE.test(value);
}

export function messageIdentity(channelId: string, messageId: string): MessageIdentity {
  return { channelId, messageId };
}

/** Stable map key for an identity. */
export function identityKey(id: MessageIdentity): string {
  return `${id.channelId}:${id.messageId}`;
}

export function parseIdentityKey(key: string): MessageIdentity | null {
  const sep = key.indexOf(':');
  if (sep <= 0) return null;
  const channelId = key.slice(0, sep);
  const messageId = key.slice(sep + 1);
  if (!isSnowflake(channelId) || !isSnowflake(messageId)) return null;
  return { channelId, messageId };
}

export function sameIdentity(a: MessageIdentity, b: MessageIdentity): boolean {
  return a.channelId === b.channelId && a.messageId === b.messageId;
}

function compareSnowflakes(a: string, b: string): number {
  const x = BigInt(a);
  const y = BigInt(b);
  if (x === y) return 0;
  return x < y ? -1 : 1;
}

/** Orders by channel, then by message. Both fields must be snowflakes. */
export function compareIdentities(a: MessageIdentity, b: MessageIdentity): number {
  return compareSnowflakes(a.channelId, b.channelId) || compareSnowflakes(a.messageId, b.messageId);
}
