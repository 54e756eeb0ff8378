/**
 * Chat Routes
 *
 * Form-driven pages for the browser plus a small JSON API over the same
 * session transcript.
 */

import express, { type NextFunction, type Request, type Response, type Router } from 'express';
import { isCompletionFailure, type ChatError } from '../chat/errors.js';
import type { ChatResponder } from '../chat/responder.js';
import { formatReply } from '../chat/responder.js';
import { turnText, windowTranscript } from '../chat/transcript.js';
import type { Transcript } from '../types/index.js';
import { clearTranscript, loadTranscript, saveTranscript } from './session.js';
import type { ChatPageOptions } from './views.js';

export interface RouteDeps {
  responder: ChatResponder;
  historyLimit: number;
  renderPage: (transcript: Transcript, options: ChatPageOptions) => string;
}

export const RENDER_FAILURE_MESSAGE =
  'Error: Could not render the chat page. Check the server log for details.';

function readMessage(body: unknown): string | null {
  if (typeof body !== 'object' || body === null) return null;
  const message: unknown = Reflect.get(body, 'message');
  if (typeof message !== 'string' || message.trim() === '') return null;
  return message;
}

function describeError(error: ChatError) {
  return {
    kind: error.kind,
    ...(isCompletionFailure(error) ? { reason: error.reason } : {}),
    message: error.message,
  };
}

function serializeTranscript(transcript: Transcript) {
  return transcript.map(turn => ({ role: turn.role, text: turnText(turn) }));
}

/**
 * Browser routes: GET / renders, POST / sends, GET /clear resets
 */
export function chatRoutes(deps: RouteDeps): Router {
  const router = express.Router();

  router.get('/', (req: Request, res: Response) => {
    const transcript = loadTranscript(req.session);

    let html: string;
    try {
      html = deps.renderPage(transcript, {
        model: deps.responder.model,
        ready: deps.responder.isReady,
      });
    } catch (error) {
      console.error('[ChatServer] Failed to render chat page:', error);
      res.status(500).type('text/plain').send(RENDER_FAILURE_MESSAGE);
      return;
    }

    res.type('html').send(html);
  });

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const message = readMessage(req.body);

      if (message) {
        const current = loadTranscript(req.session);
        const { transcript } = await deps.responder.exchange(current, message);
        saveTranscript(req.session, windowTranscript(transcript, deps.historyLimit));
      }

      res.redirect(303, '/');
    } catch (error) {
      next(error);
    }
  });

  router.get('/clear', (req: Request, res: Response) => {
    clearTranscript(req.session);
    res.redirect(303, '/');
  });

  return router;
}

/**
 * JSON routes mounted under /api
 */
export function apiRoutes(deps: RouteDeps): Router {
  const router = express.Router();

  router.get('/transcript', (req: Request, res: Response) => {
    res.json({ transcript: serializeTranscript(loadTranscript(req.session)) });
  });

  router.delete('/transcript', (req: Request, res: Response) => {
    clearTranscript(req.session);
    res.json({ transcript: serializeTranscript(loadTranscript(req.session)) });
  });

  router.post('/messages', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const message = readMessage(req.body);

      if (!message) {
        res.status(400).json({
          ok: false,
          error: { kind: 'invalid_request', message: 'message is required' },
        });
        return;
      }

      const current = loadTranscript(req.session);
      const { transcript, result } = await deps.responder.exchange(current, message);
      const kept = windowTranscript(transcript, deps.historyLimit);
      saveTranscript(req.session, kept);

      res.json({
        ok: result.ok,
        reply: formatReply(result),
        ...(result.ok ? {} : { error: describeError(result.error) }),
        transcript: serializeTranscript(kept),
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
