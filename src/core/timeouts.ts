// Named durations for menu timeouts, ephemeral delays and sweep intervals.

export const SHORT_TIMEOUT_MS = 5_000;
export const MEDIUM_TIMEOUT_MS = 20_000;
export const LONG_TIMEOUT_MS = 60_000;
export const EXTRA_LONG_TIMEOUT_MS = 600_000;
