/**
 * Chat Responder
 *
 * Turns a transcript into the model's next reply: assemble the prompt, ask
 * the completion client, sanitize what comes back. Failures are returned as
 * tagged results rather than thrown, so callers can branch on them.
 */

import type { CompletionClient } from '../clients/anthropic/client.js';
import { classifyCompletionError } from '../config/models.js';
import { err, ok, type Result, type Transcript } from '../types/index.js';
import {
  ChatError,
  CompletionFailure,
  ConfigurationError,
  EmptyTranscriptError,
} from './errors.js';
import { assemblePrompt } from './prompt.js';
import { sanitizeResponse } from './sanitize.js';
import { appendTurn } from './transcript.js';

export type ChatResult = Result<string, ChatError>;

export interface ExchangeResult {
  transcript: Transcript;
  result: ChatResult;
}

export const NOT_INITIALIZED_MESSAGE =
  'Error: The chat model is not initialized. Check API key and configuration.';

/**
 * Render a result as the text stored in the transcript for the model's turn
 */
export function formatReply(result: ChatResult): string {
  if (result.ok) {
    return result.value;
  }

  switch (result.error.kind) {
    case 'configuration':
      return NOT_INITIALIZED_MESSAGE;
    case 'completion':
      return `Error: Could not reach Parley. Please try again. (${result.error.message})`;
    case 'empty_transcript':
      return `Error: ${result.error.message}`;
  }
}

export class ChatResponder {
  private client: Result<CompletionClient, ConfigurationError>;

  /**
   * @param client - resolved completion client, or the reason none is available
   */
  constructor(client: Result<CompletionClient, ConfigurationError>) {
    this.client = client;
  }

  get isReady(): boolean {
    return this.client.ok;
  }

  get model(): string | null {
    return this.client.ok ? this.client.value.model : null;
  }

  /**
   * Produce the model's reply to the transcript. Never throws.
   */
  async respond(transcript: Transcript): Promise<ChatResult> {
    if (!this.client.ok) {
      return err(this.client.error);
    }

    if (transcript.length === 0) {
      return err(new EmptyTranscriptError());
    }

    const prompt = assemblePrompt(transcript);

    try {
      const raw = await this.client.value.complete(prompt);
      return ok(sanitizeResponse(raw));
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      const { reason, statusCode } = classifyCompletionError(cause);
      console.error(`[Responder] Completion failed (${reason}): ${cause.message}`);
      return err(new CompletionFailure(cause, reason, statusCode));
    }
  }

  /**
   * Append the user's message, ask for a reply and append it as the model's turn.
   *
   * Both turns are appended even when the request fails; the model turn then
   * carries the error text.
   */
  async exchange(transcript: Transcript, message: string): Promise<ExchangeResult> {
    const withMessage = appendTurn(transcript, 'user', message);
    const result = await this.respond(withMessage);

    return {
      transcript: appendTurn(withMessage, 'model', formatReply(result)),
      result,
    };
  }
}
