// Constants
export {
  DEFAULT_UNIT_DIR,
  DEFAULT_BASE_PREFIX,
  DEFAULT_NEW_PREFIX,
  DEFAULT_UNIT_SUFFIX,
  DEFAULT_DATA_SUFFIX,
  DEFAULT_OUTPUT_SUFFIX,
  DEFAULT_DATA_DIR,
  DEFAULT_LOG_DIR,
  DEFAULT_LOG_PREFIX,
  DEFAULT_WORKING_DIRECTORY,
  DEFAULT_EXECUTABLE_PATH,
  DEFAULT_WORKER_SCRIPT_PATH,
  DEFAULT_POLL_INTERVAL_S,
  LOG_SYNC_ENV,
} from './types/common.js';

// Schemas — Naming
export { DataFileStrategy, NamingConfig } from './schemas/naming.js';
export type { NamingConfigInput } from './schemas/naming.js';

// Errors
export { ConfigurationError, PrivilegeError } from './errors.js';

// Logging
export { createLogger } from './logger.js';
export type { Logger, LoggerOptions } from './logger.js';

// System
export { isRoot, requireRoot } from './system/privilege.js';
