/**
 * Manifest Service
 *
 * Reads the manifest from the course root and hands it to the parser, then
 * gives content resources that no module places a module of their own.
 */

import * as fs from 'fs';
import * as path from 'path';

import { MANIFEST_FILENAME } from '../config/cartridge-schema';
import { UNPLACED_MODULE_ID, UNPLACED_MODULE_TITLE } from '../config/tutor-schema';
import { OrganizationNode, ResolvedManifest, ResourceType } from '../models/source-entity.model';
import { resolveManifest } from '../parsers/manifest-parser';
import { FatalMigrationError, toError } from '../parsers/parser-result';

import { MigrationReport } from './report-aggregator.service';

/**
 * Load and resolve the manifest of a course directory
 * @throws FatalMigrationError when the manifest is absent, unreadable or invalid
 */
export function loadManifest(
  rootDir: string,
  report: MigrationReport,
  manifestFileName: string = MANIFEST_FILENAME
): ResolvedManifest {
  const manifestPath = path.join(rootDir, manifestFileName);

  if (!fs.existsSync(manifestPath)) {
    throw new FatalMigrationError(`Manifest not found: ${manifestPath}`, manifestPath);
  }

  let source: string;
  try {
    source = fs.readFileSync(manifestPath, 'utf-8');
  } catch (error) {
    throw new FatalMigrationError(
      `Cannot read manifest: ${manifestPath}`,
      manifestPath,
      toError(error)
    );
  }

  return resolveManifest(source, report, manifestPath);
}

/** Resource types that become a lesson, quiz or assignment of their own */
const PLACEABLE_TYPES: ReadonlySet<ResourceType> = new Set(['page', 'assignment', 'quiz']);

/**
 * Append a synthetic module holding every page, assignment and quiz resource
 * that no organization item references. Resources another resource names as a
 * dependency are part of that resource and stay unplaced.
 */
export function placeUnplacedResources(
  manifest: ResolvedManifest,
  report: MigrationReport,
  moduleTitle: string = UNPLACED_MODULE_TITLE
): ResolvedManifest {
  const placed = new Set<string>();
  const visit = (node: OrganizationNode): void => {
    if (node.resourceRef) {
      placed.add(node.resourceRef);
    }
    node.children.forEach(visit);
  };
  visit(manifest.tree);

  const dependencies = new Set<string>();
  for (const resource of manifest.resources.values()) {
    resource.dependencies.forEach(dependency => dependencies.add(dependency));
  }

  const unplaced = [...manifest.resources.values()].filter(
    resource =>
      PLACEABLE_TYPES.has(resource.type) &&
      !placed.has(resource.identifier) &&
      !dependencies.has(resource.identifier)
  );
  if (unplaced.length === 0) {
    return manifest;
  }

  for (const resource of unplaced) {
    report.increment('unplaced');
    report.append(
      'manifest',
      'warning',
      'UNPLACED_RESOURCE',
      `Resource ${resource.identifier} is in no module; placed under "${moduleTitle}"`,
      resource.identifier
    );
  }

  const module: OrganizationNode = {
    identifier: UNPLACED_MODULE_ID,
    title: moduleTitle,
    children: unplaced.map(resource => ({
      identifier: resource.identifier,
      title: resource.title ?? '',
      children: [],
      resourceRef: resource.identifier,
    })),
  };

  return {
    ...manifest,
    tree: { ...manifest.tree, children: [...manifest.tree.children, module] },
  };
}
