export { createApp, resolveStaticDir, type ChatAppOptions } from './app.js';
export { startServer, handleShutdown, listeningUrl } from './server.js';
export { loadTranscript, saveTranscript, clearTranscript } from './session.js';
export { renderChatPage, renderTurnText, escapeHtml } from './views.js';
export { RENDER_FAILURE_MESSAGE } from './routes.js';
