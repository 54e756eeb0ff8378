/**
 * Model configuration and completion error classification
 */

import Anthropic from '@anthropic-ai/sdk';
import type { CompletionFailureReason } from '../chat/errors.js';

export const DEFAULT_MODEL = 'claude-sonnet-4-20250514';

/**
 * Loose shape check for Anthropic model ids, e.g. claude-sonnet-4-20250514
 * or claude-3-5-haiku-latest. Whether the id exists is only known to the API.
 */
export function isPlausibleModelId(model: string): boolean {
  return /^claude-[a-z0-9][a-z0-9.-]*$/.test(model);
}

function reasonFromStatus(status: number): CompletionFailureReason {
  if (status === 401 || status === 403) return 'auth';
  if (status === 429) return 'rate_limited';
  if (status === 408 || status === 504) return 'timeout';
  if (status >= 500) return 'unavailable';
  if (status >= 400) return 'invalid_request';
  return 'unknown';
}

/**
 * Classify an error raised while requesting a completion.
 *
 * SDK errors are classified by type and status; anything else falls back to
 * matching well-known network error text.
 */
export function classifyCompletionError(error: Error): {
  reason: CompletionFailureReason;
  statusCode?: number;
} {
  if (error instanceof Anthropic.APIConnectionTimeoutError) {
    return { reason: 'timeout' };
  }
  if (error instanceof Anthropic.APIConnectionError) {
    return { reason: 'unavailable' };
  }
  if (error instanceof Anthropic.APIError && typeof error.status === 'number') {
    return { reason: reasonFromStatus(error.status), statusCode: error.status };
  }

  const message = error.message.toLowerCase();
  if (message.includes('timeout') || message.includes('timed out') || message.includes('etimedout')) {
    return { reason: 'timeout' };
  }
  if (message.includes('rate limit') || message.includes('rate_limit') || message.includes('quota')) {
    return { reason: 'rate_limited' };
  }
  if (
    message.includes('econnrefused') ||
    message.includes('econnreset') ||
    message.includes('enotfound') ||
    message.includes('eai_again') ||
    message.includes('overloaded') ||
    message.includes('fetch failed')
  ) {
    return { reason: 'unavailable' };
  }
  return { reason: 'unknown' };
}
