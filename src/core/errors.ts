export type ErrorCode = "INVALID_WORD" | "RESOURCE_EXHAUSTED";

export class SuggestError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type InvalidWordReason = "EMPTY" | "TOO_LONG" | "NOT_ALPHABETIC" | "BAD_POPULARITY";

/** Raised at the boundary for tokens the core must never see. */
export class InvalidWordError extends SuggestError {
  constructor(
    readonly token: string,
    readonly reason: InvalidWordReason,
    message: string,
  ) {
    super("INVALID_WORD", message);
  }
}

/**
 * Fatal: working memory for a trie node or edit-distance rows could not be allocated.
 * Callers should abort the operation and let the process terminate.
 */
export class ResourceExhaustedError extends SuggestError {
  constructor(
    readonly resource: string,
    options?: ErrorOptions,
  ) {
    super("RESOURCE_EXHAUSTED", `unable to allocate ${resource}`, options);
  }
}

/** Runs an allocating step, turning the runtime's RangeError into ResourceExhaustedError. */
export function guardAllocation<T>(resource: string, allocate: () => T): T {
  try {
    return allocate();
  } catch (e) {
    if (e instanceof RangeError) throw new ResourceExhaustedError(resource, { cause: e });
    throw e;
  }
}
