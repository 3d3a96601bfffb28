import { ServiceError, errorStatus, toError } from '../utils/errors';
import { logger } from '../utils/logger';

export interface CompletionOptions {
  apiKey: string;
  model: string;
  maxRetries?: number;
  /** base for the 429 backoff: attempt n waits 2^n * baseDelayMs */
  baseDelayMs?: number;
  maxTokens?: number;
}

export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_BASE_DELAY_MS = 1000;

/**
 * Retries rate limits with exponential backoff, fails fast on request or
 * auth errors and raises a ServiceError once attempts run out. Never
 * returns a made-up reply.
 */
export async function completeWithRetries(
  provider: string,
  call: () => Promise<string>,
  options: Pick<CompletionOptions, 'maxRetries' | 'baseDelayMs'> = {}
): Promise<string> {
  const maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
  const baseDelayMs = options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
  let lastError: Error = new Error('No completion attempt made');

  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      const content = (await call()).trim();
      if (content.length === 0) {
        throw new Error('Empty completion');
      }
      logger.debug(`${provider} response generated`, { attempt });
      return content;
    } catch (error) {
      lastError = toError(error);
      const status = errorStatus(error);

      if (status === 429) {
        const delay = Math.pow(2, attempt) * baseDelayMs;
        logger.warn(`${provider} rate limited, backing off`, { attempt, delay });
        await new Promise((resolve) => setTimeout(resolve, delay));
        continue;
      }

      if (status === 400 || status === 401) {
        throw new ServiceError(provider, 'complete', lastError, false);
      }

      logger.error(`${provider} error`, { attempt, error: lastError.message });
    }
  }

  logger.error(`${provider} failed after retries`, { error: lastError.message });
  throw new ServiceError(provider, 'complete', lastError, true);
}
