/**
 * Chat Server
 *
 * Express application wiring: sessions, static assets, chat pages and the
 * JSON API. The completion client is resolved by the caller and handed in
 * through the responder.
 */

import path from 'node:path';
import { fileURLToPath } from 'node:url';
import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import session from 'express-session';
import createMemoryStore from 'memorystore';
import type { ChatResponder } from '../chat/responder.js';
import { apiRoutes, chatRoutes, type RouteDeps } from './routes.js';
import { renderChatPage } from './views.js';

export interface ChatAppOptions {
  responder: ChatResponder;
  historyLimit: number;
  sessionSecret: string;
  /** Idle lifetime of a session; expired ones are pruned from the store */
  sessionTtlMs?: number;
  /** Session store; defaults to a pruning in-memory store */
  store?: session.Store;
  staticDir?: string;
  renderPage?: RouteDeps['renderPage'];
}

/**
 * Directory holding the stylesheet, resolved relative to this module so it
 * works from both src/ and dist/
 */
export const DEFAULT_SESSION_TTL_MS = 24 * 60 * 60 * 1000;

const MemoryStore = createMemoryStore(session);

export function resolveStaticDir(): string {
  const here = path.dirname(fileURLToPath(import.meta.url));
  return path.resolve(here, '..', '..', 'public');
}

export function createApp(options: ChatAppOptions): Express {
  const app = express();

  const deps: RouteDeps = {
    responder: options.responder,
    historyLimit: options.historyLimit,
    renderPage: options.renderPage ?? renderChatPage,
  };

  app.disable('x-powered-by');

  const ttl = options.sessionTtlMs ?? DEFAULT_SESSION_TTL_MS;

  app.use(
    session({
      name: 'parley.sid',
      secret: options.sessionSecret,
      store: options.store ?? new MemoryStore({ checkPeriod: ttl }),
      resave: false,
      saveUninitialized: false,
      rolling: true,
      cookie: { httpOnly: true, sameSite: 'lax', maxAge: ttl },
    })
  );

  app.use('/static', express.static(options.staticDir ?? resolveStaticDir()));
  app.use(express.urlencoded({ extended: false }));
  app.use(express.json());

  app.get('/healthz', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      model: options.responder.model,
      completionReady: options.responder.isReady,
    });
  });

  app.use('/api', apiRoutes(deps));
  app.use('/', chatRoutes(deps));

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    console.error('[ChatServer] Request failed:', error);
    res.status(500).type('text/plain').send('Error: Something went wrong. Check the server log for details.');
  });

  return app;
}
