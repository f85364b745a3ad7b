import { errorMessage } from '@/domain/errors';
import type { ComponentLogger } from '@/shared/logging/logger';

export type BestEffortOptions<T> = {
  fallback: T;
  /** How a swallowed failure is logged; needs `log`. Defaults to `ignore`. */
  onError?: 'ignore' | 'debug' | 'warn';
  label?: string;
  context?: Record<string, unknown>;
  log?: ComponentLogger;
};

type ReportOptions = Omit<BestEffortOptions<unknown>, 'fallback'>;

function report(error: unknown, { onError = 'ignore', log, label, context }: ReportOptions): void {
  if (onError === 'ignore' || !log) {
    return;
  }
  log[onError](label ?? 'best-effort fallback used', { ...context, message: errorMessage(error) });
}

/**
 * Runs an optional step; a failure yields `fallback` instead of propagating.
 */
export async function bestEffort<T>(
  fn: () => Promise<T>,
  options: BestEffortOptions<T>,
): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    report(error, options);
    return options.fallback;
  }
}

export function bestEffortSync<T>(fn: () => T, options: BestEffortOptions<T>): T {
  try {
    return fn();
  } catch (error) {
    report(error, options);
    return options.fallback;
  }
}

/** The parsed value is not validated; callers narrow it. */
export function safeJsonParse<T>(
  raw: string,
  fallback: T,
  options: Omit<BestEffortOptions<T>, 'fallback'> = {},
): T {
  return bestEffortSync<T>(() => JSON.parse(raw), { ...options, fallback });
}

/** Body text of an HTTP response, or `fallback` when the stream breaks. */
export async function safeReadText(
  response: Pick<Response, 'text'>,
  fallback = '',
  options: Omit<BestEffortOptions<string>, 'fallback'> = {},
): Promise<string> {
  return bestEffort(() => response.text(), { ...options, fallback });
}
