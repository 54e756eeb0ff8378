/**
 * Transcript
 *
 * Immutable helpers over the turn history of one session. Every operation
 * returns a new array; stored transcripts are never mutated in place.
 */

import type { Role, Transcript, Turn } from '../types/index.js';

export const WELCOME_MESSAGE = "Hi! I'm Parley, your assistant. How can I help you today?";

export const DEFAULT_HISTORY_LIMIT = 50;

/**
 * A fresh transcript holding only the welcome turn
 */
export function createTranscript(): Transcript {
  return [createTurn('model', WELCOME_MESSAGE)];
}

export function createTurn(role: Role, ...parts: string[]): Turn {
  return Object.freeze({ role, parts: Object.freeze([...parts]) });
}

export function turnText(turn: Turn): string {
  return turn.parts.join(' ');
}

export function appendTurn(transcript: Transcript, role: Role, text: string): Transcript {
  return [...transcript, createTurn(role, text)];
}

/**
 * Keep only the most recent `limit` turns.
 *
 * Older turns, including the welcome turn, fall off the front.
 */
export function windowTranscript(transcript: Transcript, limit: number): Transcript {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`History limit must be a positive integer, got ${limit}`);
  }
  if (transcript.length <= limit) {
    return transcript;
  }
  return transcript.slice(transcript.length - limit);
}

function isRole(value: unknown): value is Role {
  return value === 'user' || value === 'model';
}

function isTurn(value: unknown): value is Turn {
  if (typeof value !== 'object' || value === null) return false;
  const role: unknown = Reflect.get(value, 'role');
  const parts: unknown = Reflect.get(value, 'parts');
  return (
    isRole(role) &&
    Array.isArray(parts) &&
    parts.every((part: unknown) => typeof part === 'string')
  );
}

/**
 * Runtime check for transcripts read back from session storage
 */
export function isTranscript(value: unknown): value is Transcript {
  return Array.isArray(value) && value.every(isTurn);
}
