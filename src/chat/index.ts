/**
 * Chat Core
 *
 * Transcript helpers, prompt assembly, response sanitization and the
 * responder that ties them to a completion client.
 */

export * from './errors.js';
export { assemblePrompt } from './prompt.js';
export { sanitizeResponse } from './sanitize.js';
export {
  WELCOME_MESSAGE,
  DEFAULT_HISTORY_LIMIT,
  createTranscript,
  createTurn,
  turnText,
  appendTurn,
  windowTranscript,
  isTranscript,
} from './transcript.js';
export {
  ChatResponder,
  formatReply,
  NOT_INITIALIZED_MESSAGE,
  type ChatResult,
  type ExchangeResult,
} from './responder.js';
