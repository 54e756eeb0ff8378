/**
 * Parley Types
 *
 * Shared types for the chat core, the completion client and the web layer.
 */

// =============================================================================
// CONVERSATION
// =============================================================================

export type Role = 'user' | 'model';

/**
 * One message in a conversation. Text is kept as an ordered list of
 * fragments which are joined with single spaces when read.
 */
export interface Turn {
  readonly role: Role;
  readonly parts: readonly string[];
}

/**
 * Ordered turn history for a single client session
 */
export type Transcript = readonly Turn[];

// =============================================================================
// RESULT
// =============================================================================

export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}
