/**
 * Chat Errors
 *
 * Failures the chat core hands back to its callers. None of these are
 * thrown across the responder boundary; they travel inside a Result.
 */

export type ChatErrorKind = 'configuration' | 'completion' | 'empty_transcript';

/**
 * Why a completion request failed
 */
export type CompletionFailureReason =
  | 'unavailable'
  | 'rate_limited'
  | 'timeout'
  | 'auth'
  | 'invalid_request'
  | 'unknown';

export abstract class ChatError extends Error {
  abstract readonly kind: ChatErrorKind;
}

/**
 * No completion client is available: missing credential or a model id the
 * API would not resolve. Detected once at startup.
 */
export class ConfigurationError extends ChatError {
  readonly kind = 'configuration' as const;
  /** Setting that needs attention, e.g. ANTHROPIC_API_KEY */
  readonly setting?: string;

  constructor(message: string, setting?: string) {
    super(message);
    this.name = 'ConfigurationError';
    this.setting = setting;
  }
}

/**
 * The completion call itself failed. Per-request and never fatal.
 */
export class CompletionFailure extends ChatError {
  readonly kind = 'completion' as const;
  readonly reason: CompletionFailureReason;
  /** The error raised by the completion client */
  readonly underlying: Error;
  /** HTTP status code if the API answered */
  readonly statusCode?: number;

  constructor(underlying: Error, reason: CompletionFailureReason, statusCode?: number) {
    super(underlying.message, { cause: underlying });
    this.name = 'CompletionFailure';
    this.underlying = underlying;
    this.reason = reason;
    this.statusCode = statusCode;
  }
}

export class EmptyTranscriptError extends ChatError {
  readonly kind = 'empty_transcript' as const;

  constructor() {
    super('Cannot assemble a prompt from an empty transcript');
    this.name = 'EmptyTranscriptError';
  }
}

export function isChatError(error: unknown): error is ChatError {
  return error instanceof ChatError;
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}

export function isCompletionFailure(error: unknown): error is CompletionFailure {
  return error instanceof CompletionFailure;
}
