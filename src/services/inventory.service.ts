/**
 * Inventory Service
 *
 * Compares the files actually present in the course directory with the files
 * the manifest references, and recovers readable content from the files
 * nobody references.
 */

import * as fs from 'fs';
import * as path from 'path';

import { globSync } from 'glob';

import {
  IGNORED_DIRECTORIES,
  HTML_EXTENSIONS,
  MANIFEST_FILENAME,
  PRESENTATION_EXTENSIONS,
  RECOVERABLE_EXTENSIONS,
  SETTINGS_DIRECTORY,
  SYSTEM_FILENAMES,
} from '../config/cartridge-schema';
import { RECOVERED_MODULE_ID, RECOVERED_MODULE_TITLE } from '../config/tutor-schema';
import {
  OrganizationNode,
  RecoveredContentEntity,
  ResourceDescriptor,
} from '../models/source-entity.model';
import { ExtractedMarkup, ExtractionOptions, extractMarkup } from '../parsers/markup-extractor';
import { toError } from '../parsers/parser-result';
import { extractPresentation } from '../parsers/presentation-parser';
import { Logger, createSilentLogger } from '../utils/console-logger';
import { recoveredEntityId } from '../utils/id-generator';
import { baseNameOf, extensionOf } from '../utils/path-utils';
import { humanizeFileName } from '../utils/text-formatters';

import { MigrationReport } from './report-aggregator.service';

export interface InventoryScanOptions {
  /** Output directory name, skipped */
  outputDirName?: string;
  manifestFileName?: string;
}

export interface InventoryReconciliation {
  /** Inventory files no resource references */
  unreferenced: string[];

  /** Unreferenced markup and presentation files that recovery will try */
  recognized: string[];

  /** Unreferenced files of other types */
  unrecognized: string[];
}

export interface RecoveryOptions {
  assetBasePath?: string;
  recoveredModuleTitle?: string;
  logger?: Logger;
}

export interface RecoveryResult {
  /** Recovered entities sorted by source path */
  entities: RecoveredContentEntity[];

  /** Synthetic module, present when anything was recovered */
  module?: OrganizationNode;
}

/**
 * List every content candidate under the course root as sorted relative
 * POSIX paths
 */
export function scanInventory(rootDir: string, options: InventoryScanOptions = {}): string[] {
  const manifestFileName = options.manifestFileName ?? MANIFEST_FILENAME;
  const ignore = [...IGNORED_DIRECTORIES, SETTINGS_DIRECTORY]
    .concat(options.outputDirName ? [options.outputDirName] : [])
    .map(directory => `${directory}/**`);

  return globSync('**/*', { cwd: rootDir, nodir: true, dot: true, posix: true, ignore })
    .filter(file => file !== manifestFileName && !SYSTEM_FILENAMES.has(baseNameOf(file)))
    .sort();
}

/**
 * Every path the manifest references, primary hrefs and declared files alike
 */
export function collectReferencedPaths(resources: Iterable<ResourceDescriptor>): Set<string> {
  const referenced = new Set<string>();
  for (const resource of resources) {
    if (resource.href) {
      referenced.add(resource.href);
    }
    resource.files.forEach(file => referenced.add(file));
  }
  return referenced;
}

/**
 * Set difference between inventory and references
 */
export function reconcileInventory(
  inventory: readonly string[],
  referenced: ReadonlySet<string>
): InventoryReconciliation {
  const unreferenced = inventory.filter(file => !referenced.has(file)).sort();
  return {
    unreferenced,
    recognized: unreferenced.filter(file => RECOVERABLE_EXTENSIONS.has(extensionOf(file))),
    unrecognized: unreferenced.filter(file => !RECOVERABLE_EXTENSIONS.has(extensionOf(file))),
  };
}

/**
 * Read one orphan: presentations slide by slide, markup through the generic
 * profiles
 */
async function extractOrphan(
  absolutePath: string,
  relativePath: string,
  options: ExtractionOptions
): Promise<{ rawContent: string; extracted: ExtractedMarkup }> {
  const extension = extensionOf(relativePath);
  if (PRESENTATION_EXTENSIONS.has(extension)) {
    const extracted = await extractPresentation(fs.readFileSync(absolutePath), options);
    return { rawContent: extracted.body, extracted };
  }

  const rawContent = fs.readFileSync(absolutePath, 'utf-8');
  const profile = HTML_EXTENSIONS.has(extension) ? 'generic-html' : 'generic-xml';
  return { rawContent, extracted: extractMarkup(rawContent, profile, options) };
}

/**
 * Extract each recognized orphan into a recovered entity
 */
export async function recoverOrphans(
  rootDir: string,
  recognized: readonly string[],
  report: MigrationReport,
  options: RecoveryOptions = {}
): Promise<RecoveryResult> {
  const logger = options.logger ?? createSilentLogger();
  const entities: RecoveredContentEntity[] = [];

  for (const relativePath of [...recognized].sort()) {
    const id = recoveredEntityId(relativePath);

    try {
      const { rawContent, extracted } = await extractOrphan(
        path.join(rootDir, relativePath),
        relativePath,
        { assetBasePath: options.assetBasePath, filePath: relativePath }
      );

      entities.push({
        id,
        kind: 'recovered',
        origin: 'recovered',
        ...(extracted.title ? { title: extracted.title } : {}),
        rawContent,
        body: extracted.body,
        ...(extracted.notes ? { notes: extracted.notes } : {}),
        parentModuleId: RECOVERED_MODULE_ID,
        sourcePath: relativePath,
      });
      report.increment('recovered');
      report.append('inventory', 'info', 'ORPHAN_RECOVERED', `Recovered ${relativePath}`, id);
      logger.debug(`Recovered ${relativePath}`, { id, usedFallback: extracted.usedFallback });
    } catch (error) {
      const cause = toError(error);
      report.increment('filesNotRecovered');
      report.append(
        'inventory',
        'error',
        'ORPHAN_EXTRACTION_FAILED',
        `Could not recover ${relativePath}: ${cause.message}`,
        id
      );
      logger.error(`Could not recover ${relativePath}`, cause);
    }
  }

  if (entities.length === 0) {
    return { entities };
  }

  return {
    entities,
    module: {
      identifier: RECOVERED_MODULE_ID,
      title: options.recoveredModuleTitle ?? RECOVERED_MODULE_TITLE,
      children: entities.map(entity => ({
        identifier: entity.id,
        title: humanizeFileName(entity.sourcePath),
        children: [],
        recoveredEntityId: entity.id,
      })),
    },
  };
}

/**
 * Report unreferenced files recovery does not read
 */
export function reportUnrecognizedOrphans(
  unrecognized: readonly string[],
  report: MigrationReport
): void {
  for (const file of unrecognized) {
    report.append(
      'inventory',
      'info',
      'UNRECOGNIZED_ORPHAN',
      `Unreferenced file left as is: ${file}`
    );
  }
}
