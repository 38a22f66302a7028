/**
 * Config entrypoint: settings loading and defaults.
 * @module
 */
export {
  type ClientConfig,
  DEFAULT_BASE_URL,
  DEFAULT_ENV_FILE,
  DEFAULT_PAGE_SIZE,
  DEFAULT_TIMEOUT,
  ENV_VARS,
  isHeaderSafeToken,
  isValidTimeout,
  type LoadConfigOptions,
  loadConfig,
  MAX_TIMEOUT,
} from './config.js';
