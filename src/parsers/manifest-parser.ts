/**
 * Manifest Parser
 *
 * Resolves `imsmanifest.xml` into the resource map and the organization tree.
 * The document is parsed once; lookups are namespace-agnostic.
 */

import {
  MANIFEST_FILENAME,
  MARKUP_EXTENSIONS,
  WIKI_CONTENT_DIRECTORY,
} from '../config/cartridge-schema';
import {
  OrganizationNode,
  ResolvedManifest,
  ResourceDescriptor,
  ResourceType,
} from '../models/source-entity.model';
import { MigrationReport } from '../services/report-aggregator.service';
import { normalizeId } from '../utils/id-generator';
import { extensionOf, normalizeRelativePath } from '../utils/path-utils';
import { normalizeWhitespace } from '../utils/text-formatters';

import { FatalMigrationError, MarkupParseError } from './parser-result';
import {
  attributeOf,
  childElement,
  childElements,
  elementText,
  findElement,
  findElements,
  hasAncestor,
  parseMarkupDocument,
} from './xml-document';

export const UNTITLED_COURSE = 'Untitled Course';

/**
 * Classify a manifest `type` attribute
 * @example
 * classifyResourceType('imsqti_xmlv1p2/imscc_xmlv1p1/assessment', 'q1/quiz.xml') // 'quiz'
 * classifyResourceType('webcontent', 'wiki_content/intro.html') // 'page'
 * classifyResourceType('webcontent', 'web_resources/logo.png') // 'asset'
 */
export function classifyResourceType(rawType: string, href: string): ResourceType {
  const type = rawType.toLowerCase();
  if (/assessment|question-bank|quiz/.test(type)) {
    return 'quiz';
  }
  if (/assignment|associatedcontent/.test(type)) {
    return 'assignment';
  }
  if (type.includes('webcontent')) {
    if (!MARKUP_EXTENSIONS.has(extensionOf(href))) {
      return 'asset';
    }
    return href.startsWith(`${WIKI_CONTENT_DIRECTORY}/`) ? 'page' : 'web-content';
  }
  return 'unknown';
}

/**
 * Parse a manifest document
 * @throws FatalMigrationError when the document is unusable
 */
export function resolveManifest(
  source: string | undefined,
  report: MigrationReport,
  filePath: string = MANIFEST_FILENAME
): ResolvedManifest {
  if (source === undefined || !source.trim()) {
    throw new FatalMigrationError(`Manifest is empty: ${filePath}`, filePath);
  }

  let document: Document;
  try {
    document = parseMarkupDocument(source, 'xml', filePath);
  } catch (error) {
    if (error instanceof MarkupParseError) {
      throw new FatalMigrationError(
        `Manifest is not well-formed: ${error.message}`,
        filePath,
        error
      );
    }
    throw error;
  }

  const root = document.documentElement;
  if (root.localName !== 'manifest') {
    throw new FatalMigrationError(
      `Manifest root element is <${root.localName}>, expected <manifest>`,
      filePath
    );
  }

  const organizations = findElement(root, 'organizations');
  if (!organizations) {
    throw new FatalMigrationError('Manifest has no <organizations> element', filePath);
  }
  const resourcesElement = findElement(root, 'resources');
  if (!resourcesElement) {
    throw new FatalMigrationError('Manifest has no <resources> element', filePath);
  }

  const identifier = attributeOf(root, 'identifier') ?? 'course';
  const courseTitle = resolveCourseTitle(root);
  const resources = parseResources(resourcesElement, report);

  const organization = findElement(organizations, 'organization');
  if (!organization) {
    report.append(
      'manifest',
      'warning',
      'MISSING_ORGANIZATION',
      'Manifest has no <organization>; course has no modules'
    );
  }

  const modules = organization ? parseModules(organization, resources, report) : [];
  report.increment('modules', modules.length);
  report.increment('resources', resources.size);

  return {
    identifier,
    courseTitle,
    resources,
    tree: { identifier, title: courseTitle, children: modules },
  };
}

function resolveCourseTitle(root: Element): string {
  const metadata = childElement(root, 'metadata');
  const lomTitle = metadata ? findElement(metadata, 'title') : undefined;
  const lomString = lomTitle ? findElement(lomTitle, 'string') : undefined;
  const candidates = [
    elementText(lomString),
    elementText(lomTitle),
    elementText(findElements(root, 'title').find(title => !hasAncestor(title, 'metadata'))),
  ];
  const title = candidates.find(candidate => candidate.length > 0);
  return title ? normalizeWhitespace(title) : UNTITLED_COURSE;
}

function parseResources(
  resourcesElement: Element,
  report: MigrationReport
): Map<string, ResourceDescriptor> {
  const resources = new Map<string, ResourceDescriptor>();

  for (const element of findElements(resourcesElement, 'resource')) {
    const identifier = attributeOf(element, 'identifier');
    if (!identifier) {
      report.append(
        'manifest',
        'warning',
        'MISSING_IDENTIFIER',
        'Resource without identifier skipped'
      );
      continue;
    }

    const files: string[] = [];
    for (const file of findElements(element, 'file')) {
      const href = normalizeRelativePath(attributeOf(file, 'href') ?? '');
      if (href && !files.includes(href)) {
        files.push(href);
      }
    }

    const dependencies = findElements(element, 'dependency')
      .map(dependency => attributeOf(dependency, 'identifierref'))
      .filter((ref): ref is string => ref !== undefined && ref.length > 0);

    // Quiz resources often declare files only
    const href = normalizeRelativePath(attributeOf(element, 'href') ?? '') || files[0] || '';
    const rawType = attributeOf(element, 'type') ?? '';
    const title = elementText(childElement(element, 'title'));

    if (resources.has(identifier)) {
      report.append(
        'manifest',
        'warning',
        'DUPLICATE_RESOURCE',
        'Resource identifier declared more than once; the last declaration is used',
        identifier
      );
    }

    resources.set(identifier, {
      identifier,
      type: classifyResourceType(rawType, href),
      rawType,
      href,
      files,
      dependencies,
      ...(title ? { title } : {}),
    });
  }

  return resources;
}

function parseModules(
  organization: Element,
  resources: ReadonlyMap<string, ResourceDescriptor>,
  report: MigrationReport
): OrganizationNode[] {
  let items = childElements(organization, 'item');

  // Canvas wraps every module in one root item
  if (items.length === 1 && !attributeOf(items[0], 'identifierref')) {
    const wrapped = childElements(items[0], 'item');
    if (wrapped.length > 0) {
      items = wrapped;
    }
  }

  return items.map((item, index) => parseItem(item, `item-${index + 1}`, resources, report));
}

function parseItem(
  item: Element,
  fallbackId: string,
  resources: ReadonlyMap<string, ResourceDescriptor>,
  report: MigrationReport
): OrganizationNode {
  const identifier = attributeOf(item, 'identifier') ?? fallbackId;
  const title = normalizeWhitespace(elementText(childElement(item, 'title')));

  const ref = attributeOf(item, 'identifierref');
  if (ref && !resources.has(ref)) {
    report.append(
      'manifest',
      'warning',
      'UNRESOLVED_REFERENCE',
      `Item "${title || identifier}" references unknown resource ${ref}`,
      identifier
    );
  }

  const children = childElements(item, 'item').map((child, index) =>
    parseItem(child, normalizeId([identifier, 'item', String(index + 1)]), resources, report)
  );

  return {
    identifier,
    title,
    children,
    ...(ref && resources.has(ref) ? { resourceRef: ref } : {}),
  };
}
