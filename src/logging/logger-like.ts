/**
 * Minimal logger surface accepted by every component. A pino logger satisfies
 * it directly; tests pass `{ debug: vi.fn(), info: vi.fn(), ... }`.
 */
export type LoggerLike = {
  debug(obj: unknown, msg?: string): void;
  info(obj: unknown, msg?: string): void;
  warn(obj: unknown, msg?: string): void;
  error(obj: unknown, msg?: string): void;
};
