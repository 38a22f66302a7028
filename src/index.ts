/**
 * Root entrypoint: re-exports the Bonusly client, its resources and models, the core pipeline and error utilities.
 * Use this import if you want everything from a single module surface.
 * @module
 */

/** Bonusly API client with every resource attached. */
export { BonuslyClient, type FromEnvOptions } from './client.js';

/** Settings loading and defaults. */
export * from './config/index.js';

/** Request pipeline, envelope decoding and pagination. */
export * from './core/index.js';

/** Classified errors and helpers. */
export * from './error/index.js';

/** Fetch provider used by default, for custom providers to wrap. */
export * from './fetch/index.js';

/** Resource schemas and types. */
export * from './models/index.js';

/** Resource groups, for composing a client of your own. */
export * from './resources/index.js';

/** Logger contract and built-in loggers. */
export { consoleLogger, type LogMeta, type Logger, noopLogger } from './utils/logger.js';

/** Error-first result tuples. */
export type { SafeWrap, SafeWrapAsync } from './utils/wrap.js';

/** Package version, sent in the `User-Agent` header. */
export { VERSION } from './version.js';
