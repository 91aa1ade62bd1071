import { SpanStatusCode } from '@opentelemetry/api';
import type { Logger } from 'pino';
import { getTracer } from './telemetry.js';
import { sleep } from './abort.js';
import { CancelledError, errorMessage, RateLimitedError, RemoteUnavailableError } from './errors.js';
import { createComponentLogger } from './logger.js';

export interface RetryOptions {
  maxRetries?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  timeoutMs?: number;
  /** Decides whether a failure is worth another attempt. Defaults to rate-limit errors only. */
  isRetryable?: (error: unknown) => boolean;
  /** Aborting stops the current attempt and any pending backoff wait. */
  signal?: AbortSignal;
  logger?: Logger;
}

export interface RetryInvocationContext {
  attempt: number;
}

const defaultLogger = createComponentLogger('resilience');

function isRateLimited(error: unknown): boolean {
  return error instanceof RateLimitedError;
}

function backoffDelay(error: unknown, attempt: number, initialDelayMs: number, maxDelayMs: number): number {
  const exponential = Math.min(initialDelayMs * Math.pow(2, attempt - 1), maxDelayMs);
  if (error instanceof RateLimitedError && error.retryAfterMs !== undefined) {
    return Math.min(Math.max(error.retryAfterMs, exponential), maxDelayMs);
  }
  return exponential;
}

export async function withRetry<T>(
  operation: string,
  fn: (signal: AbortSignal, context: RetryInvocationContext) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxRetries = 3,
    initialDelayMs = 1000,
    maxDelayMs = 10000,
    timeoutMs = 30000,
    isRetryable = isRateLimited,
    signal: outerSignal,
    logger = defaultLogger
  } = options;

  const tracer = getTracer();

  return tracer.startActiveSpan(`retry:${operation}`, async (span) => {
    span.setAttribute('retry.operation', operation);
    span.setAttribute('retry.max', maxRetries);

    let attempt = 0;

    try {
      while (true) {
        if (outerSignal?.aborted) {
          throw new CancelledError();
        }

        const controller = new AbortController();
        const forwardAbort = () => controller.abort();
        outerSignal?.addEventListener('abort', forwardAbort, { once: true });
        let timeoutId: NodeJS.Timeout | undefined;

        try {
          const timedOperation = fn(controller.signal, { attempt });
          const result = await (timeoutMs > 0
            ? Promise.race([
                timedOperation,
                new Promise<never>((_, reject) => {
                  timeoutId = setTimeout(() => {
                    reject(new RemoteUnavailableError(`${operation} timed out after ${timeoutMs}ms`));
                    controller.abort();
                  }, timeoutMs);
                })
              ])
            : timedOperation);

          if (attempt > 0) {
            logger.info({ operation, attempt }, 'operation succeeded after retries');
            span.addEvent('retry.success', { attempt });
          }

          span.setAttribute('retry.attempts', attempt);
          span.setStatus({ code: SpanStatusCode.OK });
          return result;
        } catch (error: unknown) {
          controller.abort();
          const message = errorMessage(error);

          span.addEvent('retry.failure', { attempt, message });

          if (outerSignal?.aborted) {
            throw new CancelledError();
          }

          if (!isRetryable(error) || attempt >= maxRetries) {
            span.recordException(error instanceof Error ? error : new Error(message));
            span.setStatus({ code: SpanStatusCode.ERROR, message });
            throw error;
          }

          attempt += 1;
          const waitTime = backoffDelay(error, attempt, initialDelayMs, maxDelayMs);
          span.addEvent('retry.wait', { attempt, waitTime });
          logger.warn({ operation, attempt, maxRetries, waitTime }, 'operation failed, retrying');
          await sleep(waitTime, outerSignal);
        } finally {
          if (timeoutId) {
            clearTimeout(timeoutId);
          }
          outerSignal?.removeEventListener('abort', forwardAbort);
        }
      }
    } finally {
      span.end();
    }
  });
}
