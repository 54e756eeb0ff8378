/**
 * Chat page rendering
 */

import { turnText } from '../chat/transcript.js';
import type { Transcript, Turn } from '../types/index.js';

export interface ChatPageOptions {
  model: string | null;
  ready: boolean;
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/**
 * Escape a turn's text, keeping only the <br> markers added by the sanitizer
 */
export function renderTurnText(turn: Turn): string {
  return escapeHtml(turnText(turn)).replace(/&lt;br&gt;/g, '<br>');
}

function renderTurn(turn: Turn): string {
  const label = turn.role === 'user' ? 'You' : 'Parley';
  return `      <div class="turn turn-${turn.role}">
        <span class="turn-label">${label}</span>
        <p class="turn-text">${renderTurnText(turn)}</p>
      </div>`;
}

export function renderChatPage(transcript: Transcript, options: ChatPageOptions): string {
  const status = options.ready
    ? `<span class="status status-ready">${escapeHtml(options.model ?? '')}</span>`
    : '<span class="status status-offline">model not initialized</span>';

  return `<!DOCTYPE html>
<html lang="en">
  <head>
    <meta charset="utf-8">
    <meta name="viewport" content="width=device-width, initial-scale=1">
    <title>Parley</title>
    <link rel="stylesheet" href="/static/styles.css">
  </head>
  <body>
    <header>
      <h1>Parley</h1>
      ${status}
      <a class="clear" href="/clear">Clear chat</a>
    </header>
    <main id="transcript">
${transcript.map(renderTurn).join('\n')}
    </main>
    <form method="post" action="/" autocomplete="off">
      <input type="text" name="message" placeholder="Ask anything..." autofocus required>
      <button type="submit">Send</button>
    </form>
  </body>
</html>
`;
}
