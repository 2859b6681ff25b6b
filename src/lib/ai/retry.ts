/**
 * Retry schedule shared by the provider clients.
 */

export const MAX_RETRIES = 3;
export const RETRY_DELAYS = [5000, 15000, 45000];

export interface RetryDecision {
  retry: boolean;
  /** Overrides the scheduled delay (e.g. from a retry-after header) */
  delayMs?: number;
  /** Logged as `[AI] <reason>, retrying in Nms...` */
  reason?: string;
}

export type RetryClassifier = (error: Error, attempt: number) => RetryDecision;

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Run `call`, retrying up to {@link MAX_RETRIES} times while `classify` says
 * the failure is transient. Non-retryable errors are rethrown immediately.
 */
export async function callWithRetry<T>(
  call: () => Promise<T>,
  classify: RetryClassifier,
  wait: (ms: number) => Promise<void> = sleep
): Promise<T> {
  let lastError: Error | null = null;

  for (let attempt = 0; attempt <= MAX_RETRIES; attempt++) {
    try {
      return await call();
    } catch (error) {
      lastError = toError(error);
      const decision = classify(lastError, attempt);

      if (decision.retry && attempt < MAX_RETRIES) {
        const delay = decision.delayMs ?? RETRY_DELAYS[attempt] ?? 5000;
        console.warn(`[AI] ${decision.reason ?? 'Transient error'}, retrying in ${delay}ms...`);
        await wait(delay);
        continue;
      }

      throw lastError;
    }
  }

  throw lastError ?? new Error('AI call failed after retries');
}

/**
 * Classifier for SDKs that only surface the HTTP status in the error message.
 */
export function classifyByMessage(error: Error): RetryDecision {
  const message = error.message.toLowerCase();
  if (message.includes('429') || message.includes('rate') || message.includes('quota')) {
    return { retry: true, reason: 'Rate limited' };
  }
  if (message.includes('500') || message.includes('503') || message.includes('internal')) {
    return { retry: true, reason: 'Server error' };
  }
  return { retry: false };
}
