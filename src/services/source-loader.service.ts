/**
 * Source Loader Service
 *
 * Reads the files behind every organization node that points at a resource
 * and extracts them into content entities. Each resource is read once; a
 * failure is reported against every node that references it.
 */

import * as fs from 'fs';
import * as path from 'path';

import { encode } from 'html-entities';

import {
  ASSIGNMENT_SETTINGS_FILENAME,
  HTML_EXTENSIONS,
  MARKUP_EXTENSIONS,
  WEB_RESOURCES_DIRECTORY,
} from '../config/cartridge-schema';
import {
  AssignmentEntity,
  ContentEntity,
  OrganizationNode,
  PageEntity,
  QuestionEntity,
  QuizEntity,
  ResolvedManifest,
  ResourceDescriptor,
} from '../models/source-entity.model';
import { extractAssessment, extractQuizMeta } from '../parsers/assessment-parser';
import { extractAssignmentSettings } from '../parsers/assignment-parser';
import { DEFAULT_ASSET_BASE_PATH, extractMarkup } from '../parsers/markup-extractor';
import { MarkupParseError, toError } from '../parsers/parser-result';
import { Logger, createSilentLogger } from '../utils/console-logger';
import { baseNameOf, extensionOf } from '../utils/path-utils';

import { MigrationReport } from './report-aggregator.service';

const ASSESSMENT_META_FILENAME = 'assessment_meta.xml';

export interface SourceLoaderOptions {
  assetBasePath?: string;
  assetRootDir?: string;
  logger?: Logger;
}

/**
 * A resource's content could not be loaded
 */
export class ContentLoadError extends Error {
  constructor(
    message: string,
    public readonly code: 'MISSING_CONTENT_FILE' | 'MARKUP_PARSE_FAILED' | 'CONTENT_READ_FAILED',
    public readonly filePath: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'ContentLoadError';
  }
}

type LoadOutcome = { entity: ContentEntity } | { failure: ContentLoadError };

/**
 * Load the content entities of every resource the organization tree uses
 */
export function loadSourceEntities(
  rootDir: string,
  manifest: ResolvedManifest,
  report: MigrationReport,
  options: SourceLoaderOptions = {}
): Map<string, ContentEntity> {
  const logger = options.logger ?? createSilentLogger();
  const outcomes = new Map<string, LoadOutcome>();
  const entities = new Map<string, ContentEntity>();

  const visit = (node: OrganizationNode, moduleId: string): void => {
    const resource = node.resourceRef ? manifest.resources.get(node.resourceRef) : undefined;
    if (resource) {
      let outcome = outcomes.get(resource.identifier);
      if (!outcome) {
        outcome = loadResource(rootDir, resource, manifest.resources, moduleId, options);
        outcomes.set(resource.identifier, outcome);
        if ('entity' in outcome) {
          entities.set(resource.identifier, outcome.entity);
          countEntity(outcome.entity, report);
          logger.debug(`Loaded ${resource.identifier}`, { kind: outcome.entity.kind });
        }
      }
      if ('failure' in outcome) {
        const { code, message } = outcome.failure;
        report.append('extraction', 'error', code, message, node.identifier);
        logger.error(`Could not load content of ${node.identifier}`, outcome.failure);
      }
    }
    node.children.forEach(child => visit(child, moduleId));
  };

  manifest.tree.children.forEach(module => visit(module, module.identifier));
  return entities;
}

function countEntity(entity: ContentEntity, report: MigrationReport): void {
  switch (entity.kind) {
    case 'page':
      report.increment('pages');
      break;
    case 'assignment':
      report.increment('assignments');
      break;
    case 'quiz':
      report.increment('quizzes');
      report.increment('questions', entity.questions.length);
      break;
    case 'recovered':
      break;
  }
}

function loadResource(
  rootDir: string,
  resource: ResourceDescriptor,
  resources: ReadonlyMap<string, ResourceDescriptor>,
  moduleId: string,
  options: SourceLoaderOptions
): LoadOutcome {
  try {
    switch (resource.type) {
      case 'quiz':
        return { entity: loadQuiz(rootDir, resource, resources, moduleId, options) };
      case 'assignment':
        return { entity: loadAssignment(rootDir, resource, moduleId, options) };
      case 'asset':
        return { entity: loadAsset(rootDir, resource, moduleId, options) };
      case 'page':
      case 'web-content':
      case 'unknown':
        return { entity: loadPage(rootDir, resource, moduleId, options) };
    }
  } catch (error) {
    if (error instanceof ContentLoadError) {
      return { failure: error };
    }
    if (error instanceof MarkupParseError) {
      return {
        failure: new ContentLoadError(error.message, 'MARKUP_PARSE_FAILED', error.filePath, error),
      };
    }
    const cause = toError(error);
    return {
      failure: new ContentLoadError(
        `Could not read content of ${resource.identifier}: ${cause.message}`,
        'CONTENT_READ_FAILED',
        resource.href,
        cause
      ),
    };
  }
}

function readRequired(rootDir: string, relativePath: string, resource: ResourceDescriptor): string {
  const absolutePath = path.join(rootDir, relativePath);
  if (!relativePath || !fs.existsSync(absolutePath)) {
    throw new ContentLoadError(
      `Content file of ${resource.identifier} not found: ${relativePath || '(none declared)'}`,
      'MISSING_CONTENT_FILE',
      relativePath
    );
  }
  return fs.readFileSync(absolutePath, 'utf-8');
}

function readOptional(rootDir: string, relativePath: string | undefined): string | undefined {
  if (!relativePath) {
    return undefined;
  }
  const absolutePath = path.join(rootDir, relativePath);
  return fs.existsSync(absolutePath) ? fs.readFileSync(absolutePath, 'utf-8') : undefined;
}

function loadPage(
  rootDir: string,
  resource: ResourceDescriptor,
  moduleId: string,
  options: SourceLoaderOptions
): PageEntity {
  const base = {
    id: resource.identifier,
    kind: 'page' as const,
    origin: 'manifest' as const,
    parentModuleId: moduleId,
    sourcePath: resource.href,
    resourceType: resource.type,
  };

  // Links and discussions may carry no file at all
  if (!resource.href && resource.type === 'unknown') {
    return { ...base, rawContent: '', body: '' };
  }
  if (!MARKUP_EXTENSIONS.has(extensionOf(resource.href))) {
    return loadAsset(rootDir, resource, moduleId, options);
  }

  const rawContent = readRequired(rootDir, resource.href, resource);
  const extracted = extractMarkup(
    rawContent,
    HTML_EXTENSIONS.has(extensionOf(resource.href)) ? 'page-html' : 'page-xml',
    { assetBasePath: options.assetBasePath, filePath: resource.href }
  );

  return {
    ...base,
    ...(extracted.title ? { title: extracted.title } : {}),
    rawContent,
    body: extracted.body,
    ...(extracted.notes ? { notes: extracted.notes } : {}),
  };
}

/**
 * Non-markup file: the lesson body links the file under the asset path
 */
function loadAsset(
  rootDir: string,
  resource: ResourceDescriptor,
  moduleId: string,
  options: SourceLoaderOptions
): PageEntity {
  if (!resource.href || !fs.existsSync(path.join(rootDir, resource.href))) {
    throw new ContentLoadError(
      `Asset of ${resource.identifier} not found: ${resource.href || '(none declared)'}`,
      'MISSING_CONTENT_FILE',
      resource.href
    );
  }

  const assetRoot = `${options.assetRootDir ?? WEB_RESOURCES_DIRECTORY}/`;
  const relative = resource.href.startsWith(assetRoot)
    ? resource.href.slice(assetRoot.length)
    : resource.href;
  const target = `${options.assetBasePath ?? DEFAULT_ASSET_BASE_PATH}/${relative}`;

  return {
    id: resource.identifier,
    kind: 'page',
    origin: 'manifest',
    parentModuleId: moduleId,
    sourcePath: resource.href,
    resourceType: resource.type,
    rawContent: '',
    body: `<p><a href="${encodeURI(target)}">${encode(baseNameOf(resource.href))}</a></p>`,
  };
}

function loadAssignment(
  rootDir: string,
  resource: ResourceDescriptor,
  moduleId: string,
  options: SourceLoaderOptions
): AssignmentEntity {
  const candidates = [resource.href, ...resource.files];
  const htmlPath = candidates.find(file => HTML_EXTENSIONS.has(extensionOf(file)));
  const settingsPath = candidates.find(file => baseNameOf(file) === ASSIGNMENT_SETTINGS_FILENAME);

  const html = readOptional(rootDir, htmlPath);
  const settingsSource = readOptional(rootDir, settingsPath);
  if (html === undefined && settingsSource === undefined) {
    throw new ContentLoadError(
      `Assignment ${resource.identifier} has neither a description page nor settings`,
      'MISSING_CONTENT_FILE',
      resource.href
    );
  }

  const extractionOptions = { assetBasePath: options.assetBasePath };
  const page =
    html !== undefined
      ? extractMarkup(html, 'page-html', { ...extractionOptions, filePath: htmlPath })
      : undefined;
  const settings =
    settingsSource !== undefined
      ? extractAssignmentSettings(settingsSource, { ...extractionOptions, filePath: settingsPath })
      : undefined;

  const title = settings?.title ?? page?.title ?? resource.title;
  return {
    id: resource.identifier,
    kind: 'assignment',
    origin: 'manifest',
    parentModuleId: moduleId,
    sourcePath: htmlPath ?? settingsPath ?? resource.href,
    ...(title ? { title } : {}),
    rawContent: html ?? settingsSource ?? '',
    body: page && !page.usedFallback ? page.body : (settings?.description ?? page?.body ?? ''),
    metadata: settings?.metadata ?? { submissionTypes: [] },
  };
}

/**
 * Quiz settings file: declared on the quiz, declared on one of its
 * dependencies, or sitting beside the QTI file
 */
function findQuizMetaPath(
  rootDir: string,
  resource: ResourceDescriptor,
  resources: ReadonlyMap<string, ResourceDescriptor>,
  qtiPath: string
): string | undefined {
  const declared = [resource, ...resource.dependencies.map(id => resources.get(id))]
    .flatMap(owner => (owner ? [owner.href, ...owner.files] : []))
    .find(file => baseNameOf(file) === ASSESSMENT_META_FILENAME);
  if (declared) {
    return declared;
  }

  const sibling = path.posix.join(path.posix.dirname(qtiPath), ASSESSMENT_META_FILENAME);
  return fs.existsSync(path.join(rootDir, sibling)) ? sibling : undefined;
}

function loadQuiz(
  rootDir: string,
  resource: ResourceDescriptor,
  resources: ReadonlyMap<string, ResourceDescriptor>,
  moduleId: string,
  options: SourceLoaderOptions
): QuizEntity {
  const qtiPath = [resource.href, ...resource.files].find(
    file => extensionOf(file) === '.xml' && baseNameOf(file) !== ASSESSMENT_META_FILENAME
  );

  const rawContent = readRequired(rootDir, qtiPath ?? '', resource);
  const extractionOptions = { assetBasePath: options.assetBasePath };
  const assessment = extractAssessment(rawContent, { ...extractionOptions, filePath: qtiPath });

  const metaPath = qtiPath ? findQuizMetaPath(rootDir, resource, resources, qtiPath) : undefined;
  const metaSource = readOptional(rootDir, metaPath);
  const meta =
    metaSource !== undefined
      ? extractQuizMeta(metaSource, { ...extractionOptions, filePath: metaPath })
      : undefined;

  const questions: QuestionEntity[] = assessment.questions.map(question => ({
    id: question.ident,
    kind: 'question',
    origin: 'manifest',
    parentModuleId: moduleId,
    sourcePath: qtiPath ?? resource.href,
    ...(question.title ? { title: question.title } : {}),
    rawContent: '',
    sourceKind: question.sourceKind,
    text: question.text,
    points: question.points,
    answers: question.answers,
    ...(question.feedback ? { feedback: question.feedback } : {}),
  }));

  const title = meta?.title ?? assessment.title ?? resource.title;
  return {
    id: resource.identifier,
    kind: 'quiz',
    origin: 'manifest',
    parentModuleId: moduleId,
    sourcePath: qtiPath ?? resource.href,
    ...(title ? { title } : {}),
    rawContent,
    description: meta?.description ?? assessment.description,
    settings: { ...assessment.settings, ...meta?.settings },
    questions,
  };
}
