/**
 * Default operation timeouts for collaborator calls (OCR, captioning, rendering)
 */
export const OPERATION_TIMEOUT = {
  /**
   * Automated / CI contexts
   */
  CI_MS: 30_000,

  /**
   * Interactive use
   */
  INTERACTIVE_MS: 120_000,
} as const;

/**
 * Error raised when a wrapped operation does not settle in time
 */
export class TimeoutError extends Error {
  public readonly name = 'TimeoutError';

  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number,
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
  }
}

/**
 * Resolve the collaborator timeout for the current environment.
 *
 * BOOKPACK_OPERATION_TIMEOUT_MS wins when it holds a positive integer;
 * otherwise CI environments get the short timeout and everything else the
 * interactive one.
 */
export function resolveOperationTimeout(
  env: NodeJS.ProcessEnv = process.env,
): number {
  const override = Number(env.BOOKPACK_OPERATION_TIMEOUT_MS);
  if (Number.isInteger(override) && override > 0) {
    return override;
  }

  const ci = env.CI?.toLowerCase();
  if (ci && ci !== 'false' && ci !== '0') {
    return OPERATION_TIMEOUT.CI_MS;
  }
  return OPERATION_TIMEOUT.INTERACTIVE_MS;
}

/**
 * Race a promise against a timer.
 *
 * The timer is cleared as soon as the promise settles, so a fast operation
 * leaves nothing scheduled behind.
 *
 * @throws {TimeoutError} when `timeoutMs` elapses first
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operation: string,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new TimeoutError(operation, timeoutMs)),
      timeoutMs,
    );
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
