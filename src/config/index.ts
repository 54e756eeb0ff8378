/**
 * Configuration Exports
 */

export {
  getConfig,
  validateConfig,
  logConfig,
  type ParleyConfig,
  type ConfigValidation,
} from './env.js';

export {
  DEFAULT_MODEL,
  isPlausibleModelId,
  classifyCompletionError,
} from './models.js';
