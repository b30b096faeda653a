#!/usr/bin/env node
/**
 * Course Migration CLI
 *
 * Usage:
 *   course-migrate migrate ./exports/biology-101
 *   course-migrate migrate ./exports/biology-101 ./out --config migrate.yaml
 *   course-migrate migrate ./exports/biology-101 --dry-run --verbose
 *   course-migrate mappings
 */

import * as path from 'path';

import { Command } from 'commander';

import {
  ConfigError,
  MigrationConfigInput,
  loadMigrationConfigFile,
} from '../config/migration-config';
import { COUNTER_NAMES } from '../models/migration-report.model';
import { exportMigration } from '../services/export.service';
import { runMigration } from '../services/migration-pipeline.service';
import { listQuestionKindMappings } from '../transformers/question-mapping';

interface MigrateCommandOptions {
  config?: string;
  assetBase?: string;
  dryRun: boolean;
  verbose: boolean;
  quiet: boolean;
}

/**
 * Merge config file values under command-line flags
 */
export function buildMigrationInput(options: MigrateCommandOptions): MigrationConfigInput {
  const fromFile = options.config ? loadMigrationConfigFile(path.resolve(options.config)) : {};
  const input: MigrationConfigInput = { ...fromFile };

  if (options.assetBase !== undefined) {
    input.assetBasePath = options.assetBase;
  }
  if (options.verbose) {
    input.logLevel = 'debug';
  } else if (options.quiet) {
    input.logLevel = 'error';
  }
  return input;
}

/**
 * Output directory as a POSIX path relative to the course, when it sits inside
 * it, so the inventory scan leaves earlier output alone
 * @example
 * outputDirWithinCourse('/c', '/c/exports/out') // returns 'exports/out'
 * outputDirWithinCourse('/c', '/elsewhere') // returns undefined
 */
export function outputDirWithinCourse(courseDir: string, targetDir: string): string | undefined {
  const relative = path.relative(path.resolve(courseDir), path.resolve(targetDir));
  const outside = relative === '..' || relative.startsWith(`..${path.sep}`);
  if (!relative || outside || path.isAbsolute(relative)) {
    return undefined;
  }
  return relative.split(path.sep).join(path.posix.sep);
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('course-migrate')
    .description('Migrate a Common Cartridge course export into a Tutor course graph')
    .version('1.0.0');

  program
    .command('migrate')
    .description('Run the migration over an extracted course export')
    .argument('<courseDir>', 'Extracted course export directory')
    .argument('[outputDir]', 'Output directory (default: <courseDir>/migration_output)')
    .option('-c, --config <file>', 'YAML configuration file')
    .option('--asset-base <path>', 'Path asset references are rewritten to')
    .option('--dry-run', 'Run without writing output files', false)
    .option('-v, --verbose', 'Verbose output', false)
    .option('-q, --quiet', 'Only print errors', false)
    .action(
      async (courseDir: string, outputDir: string | undefined, options: MigrateCommandOptions) => {
        let failed = false;
        try {
          const input = buildMigrationInput(options);
          const targetDir = path.resolve(
            outputDir ?? path.join(courseDir, input.outputDirName ?? 'migration_output')
          );
          const nested = outputDirWithinCourse(courseDir, targetDir);
          if (nested) {
            input.outputDirName = nested;
          }

          const result = await runMigration(courseDir, input);
          const { report } = result;

          console.log('');
          console.log(`Status: ${report.status}`);
          console.log(`Errors: ${report.totals.errors}, warnings: ${report.totals.warnings}`);
          for (const name of COUNTER_NAMES) {
            if (report.counters[name] > 0) {
              console.log(`  ${name}: ${report.counters[name]}`);
            }
          }
          if (report.reviewItems.length > 0) {
            console.log(`Questions needing review: ${report.reviewItems.length}`);
          }

          if (options.dryRun) {
            console.log('Dry run: no files written');
          } else {
            for (const file of exportMigration(result, targetDir)) {
              console.log(`Wrote ${file}`);
            }
          }

          failed = report.status === 'FAILED';
        } catch (error) {
          if (error instanceof ConfigError) {
            console.error(`Configuration error: ${error.message}`);
          } else {
            console.error('Migration failed:', error);
          }
          failed = true;
        }

        if (failed) {
          process.exit(1);
        }
      }
    );

  program
    .command('mappings')
    .description('Print the question kind mapping table')
    .action(() => {
      for (const rule of listQuestionKindMappings()) {
        const source = rule.sourceKind.padEnd(34);
        console.log(`${source} -> ${rule.targetKind.padEnd(18)} ${rule.confidence}`);
      }
    });

  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      console.error('Migration failed:', error);
      process.exit(1);
    });
}
