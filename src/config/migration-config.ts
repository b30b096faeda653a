/**
 * Migration Configuration
 *
 * Options accepted by the pipeline, validated with zod. Values can come from a
 * YAML config file and from CLI flags; flags win.
 */

import * as fs from 'fs';

import * as yaml from 'js-yaml';
import { z } from 'zod';

import { toError } from '../parsers/parser-result';
import { Logger } from '../utils/console-logger';

import { MANIFEST_FILENAME, WEB_RESOURCES_DIRECTORY } from './cartridge-schema';
import { RECOVERED_MODULE_TITLE, UNPLACED_MODULE_TITLE } from './tutor-schema';

export const migrationConfigSchema = z
  .object({
    /** Manifest file name at the course root */
    manifestFileName: z.string().min(1).default(MANIFEST_FILENAME),

    /** Output directory name, excluded from the inventory scan */
    outputDirName: z.string().min(1).default('migration_output'),

    /** Prefix asset references are rewritten to */
    assetBasePath: z
      .string()
      .default('../../assets')
      .transform(value => value.replace(/\/+$/, '')),

    /** Directory `$IMS-CC-FILEBASE$` points at */
    assetRootDir: z.string().min(1).default(WEB_RESOURCES_DIRECTORY),

    /** Title of the module that receives recovered content */
    recoveredModuleTitle: z.string().min(1).default(RECOVERED_MODULE_TITLE),

    /** Title of the module that receives content resources no module places */
    unplacedModuleTitle: z.string().min(1).default(UNPLACED_MODULE_TITLE),

    /** Assignment pass mark as a share of total points */
    passMarkRatio: z.number().min(0).max(1).default(0.6),

    logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  })
  .strict();

export type MigrationConfig = z.output<typeof migrationConfigSchema>;
export type MigrationConfigInput = z.input<typeof migrationConfigSchema>;

/**
 * Options for a pipeline run
 */
export type MigrationOptions = MigrationConfigInput & {
  /** Logger to use instead of the console logger */
  logger?: Logger;
};

/**
 * Raised for invalid configuration values or unreadable config files
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly filePath?: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join(', ');
}

/**
 * Validate options and fill in defaults
 */
export function resolveMigrationConfig(input: unknown = {}): MigrationConfig {
  const parsed = migrationConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Read a YAML config file. Only the keys present in the file are returned so
 * that it can be merged under other sources.
 */
export function loadMigrationConfigFile(filePath: string): MigrationConfigInput {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read config file: ${filePath}`, filePath, toError(error));
  }

  let document: unknown;
  try {
    document = yaml.load(raw);
  } catch (error) {
    const cause = toError(error);
    throw new ConfigError(`Config file is not valid YAML: ${cause.message}`, filePath, cause);
  }

  if (document === undefined || document === null) {
    return {};
  }

  const parsed = migrationConfigSchema.partial().safeParse(document);
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid configuration in ${filePath}: ${formatIssues(parsed.error)}`,
      filePath
    );
  }

  return parsed.data;
}
