/**
 * Link & Asset Resolver
 *
 * Post-processes the HTML payloads of the target graph: asset placeholders are
 * pointed at the target asset path, asset references are checked against the
 * file inventory and internal page links are rewritten to lesson links.
 */

import {
  WEB_RESOURCES_DIRECTORY,
  WIKI_CONTENT_DIRECTORY,
  WIKI_REFERENCE_TOKENS,
} from '../config/cartridge-schema';
import { TargetCourseGraph, TargetEntity, flattenGraph } from '../models/target-entity.model';
import { DEFAULT_ASSET_BASE_PATH } from '../parsers/markup-extractor';
import { rewriteFilebaseTokens } from '../utils/html-cleaner';
import { normalizeRelativePath, safeDecodeURIComponent } from '../utils/path-utils';

import { MigrationReport } from './report-aggregator.service';

export interface LinkResolutionOptions {
  assetBasePath?: string;
  assetRootDir?: string;
}

/** `src="..."`, `href='...'` */
const LINK_ATTRIBUTE = /(?<![\w-])(src|href)(\s*=\s*)(["'])(.*?)\3/gi;

const LESSON_LINK_SCHEME = 'lesson://';

interface ResolutionContext {
  readonly assetBasePath: string;
  readonly assetRootDir: string;
  readonly inventory: ReadonlySet<string>;
  readonly lessonsByPage: ReadonlyMap<string, string>;
  readonly report: MigrationReport;
}

/**
 * Resolve links in every payload of the graph. The input graph is left as is.
 */
export function resolveGraphLinks(
  graph: TargetCourseGraph,
  inventory: Iterable<string>,
  report: MigrationReport,
  options: LinkResolutionOptions = {}
): TargetCourseGraph {
  const resolved = structuredClone(graph);
  const entities = flattenGraph(resolved);

  const lessonsByPage = new Map<string, string>();
  for (const entity of entities) {
    if (entity.kind === 'lesson' && entity.sourcePath && !lessonsByPage.has(entity.sourcePath)) {
      lessonsByPage.set(entity.sourcePath, entity.id);
    }
  }

  const context: ResolutionContext = {
    assetBasePath: (options.assetBasePath ?? DEFAULT_ASSET_BASE_PATH).replace(/\/+$/, ''),
    assetRootDir: options.assetRootDir ?? WEB_RESOURCES_DIRECTORY,
    inventory: new Set(inventory),
    lessonsByPage,
    report,
  };

  for (const entity of entities) {
    resolveEntity(entity, context);
  }
  return resolved;
}

function resolveEntity(entity: TargetEntity, context: ResolutionContext): void {
  const seen = new Set<string>();
  const resolve = (html: string): string => resolveHtml(html, entity.id, seen, context);

  entity.content = resolve(entity.content);
  if (entity.kind === 'question') {
    entity.answers.forEach(answer => {
      answer.title = resolve(answer.title);
    });
    if (entity.explanation !== null) {
      entity.explanation = resolve(entity.explanation);
    }
  }
}

/**
 * Rewrite one payload. `seen` keeps repeated references within one entity to a
 * single event.
 */
function resolveHtml(
  html: string,
  entityId: string,
  seen: Set<string>,
  context: ResolutionContext
): string {
  const rewritten = rewriteFilebaseTokens(html, context.assetBasePath);

  const assetPrefix = `${context.assetBasePath}/`;

  return rewritten.replace(
    LINK_ATTRIBUTE,
    (match: string, name: string, equals: string, quote: string, value: string) => {
      if (value.startsWith(assetPrefix)) {
        checkAsset(value.slice(assetPrefix.length), entityId, seen, context);
        return match;
      }

      const wikiToken = WIKI_REFERENCE_TOKENS.find(token => value.startsWith(`${token}/`));
      if (wikiToken) {
        const target = resolveWikiLink(value.slice(wikiToken.length + 1), entityId, seen, context);
        return target ? `${name}${equals}${quote}${target}${quote}` : match;
      }

      return match;
    }
  );
}

function checkAsset(
  reference: string,
  entityId: string,
  seen: Set<string>,
  context: ResolutionContext
): void {
  const assetPath = `${context.assetRootDir}/${normalizeRelativePath(reference)}`;
  const key = `asset:${assetPath}`;
  if (seen.has(key)) {
    return;
  }
  seen.add(key);

  if (context.inventory.has(assetPath)) {
    context.report.increment('assetsResolved');
    return;
  }
  context.report.increment('assetsMissing');
  context.report.append(
    'assets',
    'warning',
    'MISSING_ASSET',
    `Referenced asset not found: ${assetPath}`,
    entityId
  );
}

/**
 * Lesson link for `pages/<slug>`, or undefined when no lesson came from that page
 */
function resolveWikiLink(
  reference: string,
  entityId: string,
  seen: Set<string>,
  context: ResolutionContext
): string | undefined {
  const [kind, ...rest] = reference.split(/[?#]/)[0].split('/');
  const slug = safeDecodeURIComponent(rest.join('/'));
  const lessonId =
    kind === 'pages' && slug
      ? context.lessonsByPage.get(`${WIKI_CONTENT_DIRECTORY}/${slug}.html`)
      : undefined;

  const key = `link:${reference}`;
  const firstSeen = !seen.has(key);
  seen.add(key);

  if (lessonId) {
    if (firstSeen) {
      context.report.increment('linksResolved');
    }
    return `${LESSON_LINK_SCHEME}${lessonId}`;
  }

  if (firstSeen) {
    context.report.increment('linksBroken');
    context.report.append(
      'assets',
      'warning',
      'UNRESOLVED_INTERNAL_LINK',
      `Internal link has no migrated target: ${reference}`,
      entityId
    );
  }
  return undefined;
}
