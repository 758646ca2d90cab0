import { z } from 'zod';
import {
  DEFAULT_BASE_PREFIX,
  DEFAULT_DATA_DIR,
  DEFAULT_DATA_SUFFIX,
  DEFAULT_EXECUTABLE_PATH,
  DEFAULT_LOG_DIR,
  DEFAULT_LOG_PREFIX,
  DEFAULT_NEW_PREFIX,
  DEFAULT_OUTPUT_SUFFIX,
  DEFAULT_UNIT_DIR,
  DEFAULT_UNIT_SUFFIX,
  DEFAULT_WORKER_SCRIPT_PATH,
  DEFAULT_WORKING_DIRECTORY,
  LOG_SYNC_ENV,
} from '../types/common.js';

/**
 * How the data file of an instance is located.
 * - `discover`: glob `<instanceId>*<dataSuffix>` in the data dir, exactly one match required
 * - `fixed-suffix`: `<instanceId>_<suffix><dataSuffix>`, taken as-is
 */
export const DataFileStrategy = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('discover') }),
  z.object({ kind: z.literal('fixed-suffix'), suffix: z.string().min(1) }),
]);
export type DataFileStrategy = z.infer<typeof DataFileStrategy>;

const FileSuffix = z.string().regex(/^\.[^/]+$/, 'must start with "." and contain no "/"');

/**
 * Naming and path conventions used to derive parser units from base units.
 */
export const NamingConfig = z
  .object({
    /** Directory holding both the base units and the generated ones */
    unitDir: z.string().min(1).default(DEFAULT_UNIT_DIR),
    basePrefix: z.string().min(1).default(DEFAULT_BASE_PREFIX),
    newPrefix: z.string().min(1).default(DEFAULT_NEW_PREFIX),
    unitSuffix: FileSuffix.default(DEFAULT_UNIT_SUFFIX),
    dataDir: z.string().min(1).default(DEFAULT_DATA_DIR),
    dataSuffix: FileSuffix.default(DEFAULT_DATA_SUFFIX),
    outputSuffix: FileSuffix.default(DEFAULT_OUTPUT_SUFFIX),
    dataFile: DataFileStrategy.default({ kind: 'discover' }),
    logDir: z.string().min(1).default(DEFAULT_LOG_DIR),
    logPrefix: z.string().min(1).default(DEFAULT_LOG_PREFIX),
    executablePath: z.string().min(1).default(DEFAULT_EXECUTABLE_PATH),
    workerScriptPath: z.string().min(1).default(DEFAULT_WORKER_SCRIPT_PATH),
    workingDirectory: z.string().min(1).default(DEFAULT_WORKING_DIRECTORY),
    /** `KEY=VALUE` placed in the unit's Environment= line */
    unbufferedEnv: z
      .string()
      .regex(/^[A-Za-z_][A-Za-z0-9_]*=.*$/, 'must be KEY=VALUE')
      .default(`${LOG_SYNC_ENV}=1`),
    /** Enable and start each generated unit right after writing it */
    activate: z.boolean().default(true),
  })
  .strict()
  .refine((c) => !c.newPrefix.startsWith(c.basePrefix), {
    message: 'newPrefix must not start with basePrefix',
    path: ['newPrefix'],
  });
export type NamingConfig = z.infer<typeof NamingConfig>;
export type NamingConfigInput = z.input<typeof NamingConfig>;
