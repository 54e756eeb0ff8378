/**
 * Prompt Assembly
 *
 * Flattens a transcript into the line-oriented text prompt sent to the
 * completion client:
 *
 *   model: Hi! How can I help?
 *   user: what's a haiku?
 *
 * The final line is always framed as the user's, whatever role the last
 * turn actually carries. Roles and text are passed through unescaped.
 */

import type { Transcript } from '../types/index.js';
import { EmptyTranscriptError } from './errors.js';
import { turnText } from './transcript.js';

export function assemblePrompt(transcript: Transcript): string {
  if (transcript.length === 0) {
    throw new EmptyTranscriptError();
  }

  const history = transcript.slice(0, -1).map(turn => `${turn.role}: ${turnText(turn)}\n`);
  const last = transcript[transcript.length - 1];

  return history.join('') + `user: ${turnText(last)}\n`;
}
