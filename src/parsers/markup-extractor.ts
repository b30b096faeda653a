/**
 * Markup Extractor
 *
 * Pulls title, body and notes out of one markup document according to an
 * extraction profile. When no body candidate is present the fallback variant
 * keeps every visible text run instead, so nothing readable is lost.
 *
 * Pure: takes a string, returns fields. No filesystem access.
 */

import { encode } from 'html-entities';

import { cleanHtml } from '../utils/html-cleaner';
import { normalizeWhitespace } from '../utils/text-formatters';

import {
  MarkupSyntax,
  collectTextNodes,
  elementContent,
  findElements,
  parseMarkupDocument,
} from './xml-document';

export type ExtractionProfileKind =
  | 'page-html'
  | 'page-xml'
  | 'generic-xml'
  | 'generic-html'
  | 'assignment-settings'
  | 'assessment'
  | 'fallback';

/**
 * Which elements feed which field, by local name in priority order
 */
export interface ExtractionProfile {
  readonly kind: ExtractionProfileKind;
  readonly syntax: MarkupSyntax;
  readonly candidates: {
    readonly title: readonly string[];
    readonly body: readonly string[];
    readonly notes: readonly string[];
  };
}

const GENERIC_TITLE_CANDIDATES = [
  'title',
  'h1',
  'heading',
  'name',
  'slide-title',
  'presentation-title',
];
const GENERIC_BODY_CANDIDATES = ['body', 'content', 'text', 'description', 'slide-content'];

export const EXTRACTION_PROFILES: Readonly<Record<ExtractionProfileKind, ExtractionProfile>> = {
  'page-html': {
    kind: 'page-html',
    syntax: 'html',
    candidates: { title: ['title'], body: ['body'], notes: [] },
  },
  'page-xml': {
    kind: 'page-xml',
    syntax: 'xml',
    candidates: { title: ['title'], body: ['body', 'content', 'text'], notes: ['notes'] },
  },
  'generic-xml': {
    kind: 'generic-xml',
    syntax: 'xml',
    candidates: {
      title: GENERIC_TITLE_CANDIDATES,
      body: GENERIC_BODY_CANDIDATES,
      notes: ['notes'],
    },
  },
  'generic-html': {
    kind: 'generic-html',
    syntax: 'html',
    candidates: { title: ['title', 'h1'], body: ['body'], notes: [] },
  },
  'assignment-settings': {
    kind: 'assignment-settings',
    syntax: 'xml',
    candidates: { title: ['title'], body: ['description', 'body'], notes: [] },
  },
  assessment: {
    kind: 'assessment',
    syntax: 'xml',
    candidates: { title: ['title'], body: ['description', 'rubric'], notes: [] },
  },
  fallback: {
    kind: 'fallback',
    syntax: 'html',
    candidates: { title: [], body: [], notes: [] },
  },
};

export interface ExtractionOptions {
  /** Replacement for asset placeholders */
  assetBasePath?: string;

  /** Used in error messages */
  filePath?: string;
}

export interface ExtractedMarkup {
  /** Plain-text title, when a candidate matched */
  title?: string;

  /** Cleaned HTML body */
  body: string;

  /** Cleaned HTML notes */
  notes?: string;

  /** True when the body came from the fallback variant */
  usedFallback: boolean;
}

export const DEFAULT_ASSET_BASE_PATH = '../../assets';

/**
 * Extract fields from a document
 * @throws MarkupParseError when an XML profile meets malformed XML
 */
export function extractMarkup(
  source: string,
  profile: ExtractionProfile | ExtractionProfileKind,
  options: ExtractionOptions = {}
): ExtractedMarkup {
  const resolved = typeof profile === 'string' ? EXTRACTION_PROFILES[profile] : profile;
  const document = parseMarkupDocument(source, resolved.syntax, options.filePath);
  return extractFromDocument(document, resolved, options);
}

/**
 * Extract fields from an already parsed document
 */
export function extractFromDocument(
  document: Document,
  profile: ExtractionProfile,
  options: ExtractionOptions = {}
): ExtractedMarkup {
  const cleanOptions = { assetBasePath: options.assetBasePath ?? DEFAULT_ASSET_BASE_PATH };

  const titleText = firstWithContent(
    document,
    profile.candidates.title,
    element => element.textContent ?? ''
  );
  const bodyMarkup = firstWithContent(document, profile.candidates.body, elementContent);
  const notesMarkup = firstWithContent(document, profile.candidates.notes, elementContent);

  const title = titleText !== undefined ? normalizeWhitespace(titleText) : undefined;
  const notes = notesMarkup !== undefined ? cleanHtml(notesMarkup, cleanOptions) : undefined;

  if (bodyMarkup !== undefined) {
    return { title, body: cleanHtml(bodyMarkup, cleanOptions), notes, usedFallback: false };
  }

  return {
    title,
    body: cleanHtml(fallbackBody(document), cleanOptions),
    notes,
    usedFallback: true,
  };
}

/**
 * First candidate element, in candidate priority then document order, whose
 * content is not blank
 */
function firstWithContent(
  document: Document,
  candidates: readonly string[],
  read: (element: Element) => string
): string | undefined {
  for (const localName of candidates) {
    for (const element of findElements(document, localName)) {
      const content = read(element);
      if (content.trim()) {
        return content;
      }
    }
  }
  return undefined;
}

/**
 * Every visible text run as a paragraph. Consecutive text nodes under the same
 * parent element form one run.
 */
function fallbackBody(document: Document): string {
  const runs: { parent: Node | null; parts: string[] }[] = [];
  for (const node of collectTextNodes(document)) {
    const last = runs[runs.length - 1];
    if (last && last.parent === node.parentNode) {
      last.parts.push(node.textContent ?? '');
    } else {
      runs.push({ parent: node.parentNode, parts: [node.textContent ?? ''] });
    }
  }
  return runs
    .map(run => normalizeWhitespace(run.parts.join(' ')))
    .filter(text => text.length > 0)
    .map(text => `<p>${encode(text)}</p>`)
    .join('');
}
