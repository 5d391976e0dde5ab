// pattern: Imperative Shell

export class ProviderTimeoutError extends Error {
  constructor(
    public provider: string,
    public timeoutMs: number,
  ) {
    super(`provider '${provider}' did not respond within ${timeoutMs}ms`);
    this.name = 'ProviderTimeoutError';
  }
}

/**
 * Race a provider operation against a timer. The operation itself is not
 * cancelled; callers close the provider to release it.
 */
export async function withTimeout<T>(
  operation: Promise<T>,
  timeoutMs: number,
  provider: string,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new ProviderTimeoutError(provider, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([operation, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
