/**
 * Session-backed transcript storage
 *
 * The transcript lives under a single session key. Reads never write: a
 * visitor who has not sent a message has no stored session. Clearing removes
 * the key, so the next read starts over from the welcome turn.
 */

import type { SessionData } from 'express-session';
import { createTranscript, isTranscript } from '../chat/transcript.js';
import type { Transcript } from '../types/index.js';

declare module 'express-session' {
  interface SessionData {
    transcript: Transcript;
  }
}

type TranscriptSession = Partial<Pick<SessionData, 'transcript'>>;

/**
 * Read the session's transcript, or a fresh welcome transcript when none is stored
 */
export function loadTranscript(session: Readonly<TranscriptSession>): Transcript {
  const stored: unknown = session.transcript;

  if (stored !== undefined && isTranscript(stored)) {
    return stored;
  }

  if (stored !== undefined) {
    console.warn('[ChatServer] Discarding malformed transcript found in session');
  }

  return createTranscript();
}

export function saveTranscript(session: TranscriptSession, transcript: Transcript): void {
  session.transcript = transcript;
}

export function clearTranscript(session: TranscriptSession): void {
  delete session.transcript;
}
