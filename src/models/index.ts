/**
 * Models for the migration pipeline
 *
 * Source entities mirror the cartridge export; target entities form the Tutor
 * course graph; the report model is shared by every stage.
 */

export * from './source-entity.model';
export * from './target-entity.model';
export * from './migration-report.model';
