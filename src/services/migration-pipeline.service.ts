/**
 * Migration Pipeline Service
 *
 * Orchestrates a migration run:
 * 1. Resolve the manifest and place resources no module uses
 * 2. Reconcile the file inventory and recover orphaned content
 * 3. Extract content entities
 * 4. Transform to the target graph and resolve links
 * 5. Verify integrity
 *
 * Stages run strictly in sequence. A fatal error stops the run; the report
 * still closes with whatever was recorded.
 */

import * as fs from 'fs';
import * as path from 'path';

import { MigrationOptions, resolveMigrationConfig } from '../config/migration-config';
import { MigrationReportSnapshot } from '../models/migration-report.model';
import { OrganizationNode, ResourceDescriptor, SourceCourse } from '../models/source-entity.model';
import { TargetCourseGraph } from '../models/target-entity.model';
import { FatalMigrationError, toError } from '../parsers/parser-result';
import { transformCourse } from '../transformers/course-transformer';
import { ConsoleLogger, Logger } from '../utils/console-logger';

import { resolveGraphLinks } from './asset-resolver.service';
import { IntegrityResult, verifyIntegrity } from './integrity.service';
import {
  collectReferencedPaths,
  reconcileInventory,
  recoverOrphans,
  reportUnrecognizedOrphans,
  scanInventory,
} from './inventory.service';
import { loadManifest, placeUnplacedResources } from './manifest.service';
import { MigrationReport } from './report-aggregator.service';
import { loadSourceEntities } from './source-loader.service';

export interface MigrationResult {
  /** Null when the run was aborted */
  graph: TargetCourseGraph | null;
  report: MigrationReportSnapshot;

  /** Present when the integrity stage ran */
  integrity?: IntegrityResult;

  /** Absolute course directory the run read */
  sourceDir: string;

  /** Asset directory under `sourceDir` */
  assetRootDir: string;
}

/**
 * Run the full migration over a course directory. Rejects with a ConfigError
 * when the options are invalid; every other failure ends in a FAILED report.
 */
export async function runMigration(
  rootPath: string,
  options: MigrationOptions = {}
): Promise<MigrationResult> {
  const { logger: injectedLogger, ...input } = options;
  const config = resolveMigrationConfig(input);
  const logger: Logger = injectedLogger ?? new ConsoleLogger('migrate', config.logLevel);

  const rootDir = path.resolve(rootPath);
  const report = new MigrationReport(rootDir);

  try {
    // Step 1: Manifest
    logger.info('[1/5] Resolving manifest...');
    const manifest = placeUnplacedResources(
      loadManifest(rootDir, report, config.manifestFileName),
      report,
      config.unplacedModuleTitle
    );
    report.setCourseTitle(manifest.courseTitle);
    logger.info(`Course "${manifest.courseTitle}"`, {
      modules: manifest.tree.children.length,
      resources: manifest.resources.size,
    });

    // Step 2: Inventory
    logger.info('[2/5] Reconciling file inventory...');
    const inventory = scanInventory(rootDir, {
      outputDirName: config.outputDirName,
      manifestFileName: config.manifestFileName,
    });
    report.increment('inventoryFiles', inventory.length);
    reportMissingReferences(rootDir, manifest.resources.values(), report);

    const referenced = collectReferencedPaths(manifest.resources.values());
    const reconciliation = reconcileInventory(inventory, referenced);
    report.increment('orphanedFiles', reconciliation.unreferenced.length);
    reportUnrecognizedOrphans(reconciliation.unrecognized, report);

    const recovery = await recoverOrphans(rootDir, reconciliation.recognized, report, {
      assetBasePath: config.assetBasePath,
      recoveredModuleTitle: config.recoveredModuleTitle,
      logger,
    });
    logger.info(`Inventory: ${inventory.length} files`, {
      unreferenced: reconciliation.unreferenced.length,
      recovered: recovery.entities.length,
    });

    // Step 3: Extraction
    logger.info('[3/5] Extracting content...');
    const entities = loadSourceEntities(rootDir, manifest, report, {
      assetBasePath: config.assetBasePath,
      assetRootDir: config.assetRootDir,
      logger,
    });
    recovery.entities.forEach(entity => entities.set(entity.id, entity));

    const tree: OrganizationNode = recovery.module
      ? { ...manifest.tree, children: [...manifest.tree.children, recovery.module] }
      : manifest.tree;
    const source: SourceCourse = {
      manifest,
      tree,
      entities,
      recoveredPaths: recovery.entities.map(entity => entity.sourcePath),
      orphanCandidates: reconciliation.recognized,
    };

    // Step 4: Transformation
    logger.info('[4/5] Transforming to course graph...');
    const transformed = transformCourse(source, report, {
      passMarkRatio: config.passMarkRatio,
      logger,
    });
    const graph = resolveGraphLinks(transformed, inventory, report, {
      assetBasePath: config.assetBasePath,
      assetRootDir: config.assetRootDir,
    });

    // Step 5: Integrity
    logger.info('[5/5] Verifying integrity...');
    const integrity = verifyIntegrity(source, graph, report);

    const snapshot = report.freeze();
    logger.info(`Migration finished: ${snapshot.status}`, {
      errors: snapshot.totals.errors,
      warnings: snapshot.totals.warnings,
    });
    return {
      graph,
      report: snapshot,
      integrity,
      sourceDir: rootDir,
      assetRootDir: config.assetRootDir,
    };
  } catch (error) {
    const cause = toError(error);
    if (cause instanceof FatalMigrationError) {
      report.append('manifest', 'error', 'FATAL_ERROR', cause.message);
    } else {
      report.append('pipeline', 'error', 'UNEXPECTED_ERROR', cause.message);
    }
    report.markAborted();
    logger.error('Migration aborted', cause);
    return {
      graph: null,
      report: report.freeze(),
      sourceDir: rootDir,
      assetRootDir: config.assetRootDir,
    };
  }
}

/**
 * Warn about every declared file that is not on disk
 */
function reportMissingReferences(
  rootDir: string,
  resources: Iterable<ResourceDescriptor>,
  report: MigrationReport
): void {
  for (const resource of resources) {
    const declared = new Set([resource.href, ...resource.files].filter(file => file.length > 0));
    for (const file of declared) {
      if (!fs.existsSync(path.join(rootDir, file))) {
        report.append(
          'inventory',
          'warning',
          'MISSING_REFERENCED_FILE',
          `Resource ${resource.identifier} references missing file ${file}`,
          resource.identifier
        );
      }
    }
  }
}
