/**
 * Workflow Utility Functions
 *
 * @module execution/workflow/utils
 */

/**
 * Generate a unique ID with a given prefix
 *
 * @example
 * ```typescript
 * const id = generateId('run');
 * // Returns: 'run-1234567890-abc123'
 * ```
 */
export function generateId(prefix = "id"): string {
  const timestamp = Date.now();
  const random = Math.random().toString(36).substring(2, 9);
  return `${prefix}-${timestamp}-${random}`;
}

/**
 * Recursively freeze a plain data structure in place and return it.
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Deep-copy then freeze, leaving the caller's object untouched.
 */
export function frozenCopy<T>(value: T): T {
  return deepFreeze(structuredClone(value));
}

export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Race a promise against a timer. A non-positive timeout disables the
 * bound. The underlying work is not cancelled.
 *
 * @throws {TimeoutError} When the timer fires first
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  if (timeoutMs <= 0) {
    return promise;
  }

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
