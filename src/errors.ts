export type ReactionMenusErrorCode =
  | 'PAGE_NOT_FOUND'
  | 'UNINITIALIZED'
  | 'NO_CACHE'
  | 'DUPLICATE_LISTENER'
  | 'LOST_LISTENER';

/** Error raised by the registry, the builder and the menu state machine. */
export class ReactionMenusError extends Error {
  constructor(
    public readonly code: ReactionMenusErrorCode,
    message: string,
    public readonly pageIndex?: number,
  ) {
    super(message);
    this.name = 'ReactionMenusError';
  }
}

export function pageNotFound(index: number): ReactionMenusError {
  return new ReactionMenusError('PAGE_NOT_FOUND', `Page ${index} not found`, index);
}

export function uninitialized(): ReactionMenusError {
  return new ReactionMenusError(
    'UNINITIALIZED',
    'Message registry is missing from the runtime context (call createRuntime first)',
  );
}

export function noCache(): ReactionMenusError {
  return new ReactionMenusError(
    'NO_CACHE',
    'Reaction notification carried no acting user; the gateway cache is not available',
  );
}

export function duplicateListener(key: string): ReactionMenusError {
  return new ReactionMenusError('DUPLICATE_LISTENER', `A listener is already registered for message ${key}`);
}

export function lostListener(key: string): ReactionMenusError {
  return new ReactionMenusError(
    'LOST_LISTENER',
    `No listener registered for message ${key}; registry and listener disagree about its identity`,
  );
}

export function isReactionMenusError(err: unknown, code?: ReactionMenusErrorCode): err is ReactionMenusError {
  if (!(err instanceof ReactionMenusError)) return false;
  return code === undefined || err.code === code;
}
