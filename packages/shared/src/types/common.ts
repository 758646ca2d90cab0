/** Directory systemd reads administrator unit files from */
export const DEFAULT_UNIT_DIR = '/etc/systemd/system';

/** Prefix of the stream-quality units the parsers bind to */
export const DEFAULT_BASE_PREFIX = 'checking_stream_quality_';

/** Prefix given to generated parser units */
export const DEFAULT_NEW_PREFIX = 'csv-parser_';

export const DEFAULT_UNIT_SUFFIX = '.service';
export const DEFAULT_DATA_SUFFIX = '.csv';
export const DEFAULT_OUTPUT_SUFFIX = '.jsonl';

export const DEFAULT_DATA_DIR = '/root/aios-checking-stream-quality-services/csvs';
export const DEFAULT_LOG_DIR = '/root/process-monitor/logs';
export const DEFAULT_LOG_PREFIX = 'csv_parser';
export const DEFAULT_WORKING_DIRECTORY = '/root';

export const DEFAULT_EXECUTABLE_PATH = '/usr/bin/node';
export const DEFAULT_WORKER_SCRIPT_PATH = '/opt/streamwire/packages/worker/dist/csv-parser.js';

/**
 * Environment variable the worker reads to switch its log destination to
 * synchronous writes.
 */
export const LOG_SYNC_ENV = 'STREAMWIRE_LOG_SYNC';

/** Seconds between two polls of a CSV file */
export const DEFAULT_POLL_INTERVAL_S = 5;
