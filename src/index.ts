/**
 * Course Cartridge Migrator
 *
 * Migrates an IMS Common Cartridge course export into a Tutor-style course
 * graph without silently dropping any recognized file.
 *
 * Main capabilities:
 * - Resolve: manifest resources and organization tree
 * - Recover: content from files the manifest never references
 * - Transform: topics, lessons, quizzes, questions and assignments
 * - Verify: graph integrity and completeness against the source
 *
 * Entry points:
 * - CLI: `course-migrate migrate <courseDir> [outputDir]`
 * - Programmatic: `await runMigration(rootPath, options)`
 */

// Models
export * from './models';

// Configuration
export * from './config/cartridge-schema';
export * from './config/tutor-schema';
export * from './config/migration-config';

// Parsers
export * from './parsers/parser-result';
export * from './parsers/markup-extractor';
export * from './parsers/assessment-parser';
export * from './parsers/assignment-parser';
export * from './parsers/manifest-parser';
export * from './parsers/presentation-parser';

// Services
export * from './services/report-aggregator.service';
export * from './services/manifest.service';
export * from './services/inventory.service';
export * from './services/source-loader.service';
export * from './services/asset-resolver.service';
export * from './services/integrity.service';
export * from './services/migration-pipeline.service';
export * from './services/export.service';

// Transformers
export * from './transformers';

// Utilities
export { ConsoleLogger, Logger, LogLevel, createSilentLogger } from './utils/console-logger';
