/**
 * Markup Document Helpers
 *
 * Thin layer over jsdom. Lookups go by local name so namespaced cartridge XML
 * and plain XML read the same way.
 */

import { JSDOM } from 'jsdom';

import { MarkupParseError, toError } from './parser-result';

export type MarkupSyntax = 'xml' | 'html';

const TEXT_NODE = 3;
const CDATA_SECTION_NODE = 4;
const ELEMENT_NODE = 1;

const NAMESPACE_DECLARATION = /\s+xmlns(?::[\w.-]+)?="[^"]*"/g;

/**
 * Parse a document. XML must be well-formed; HTML parsing never fails.
 */
export function parseMarkupDocument(
  source: string,
  syntax: MarkupSyntax,
  filePath = '<inline>'
): Document {
  if (syntax === 'html') {
    return new JSDOM(source).window.document;
  }

  let document: Document;
  try {
    document = new JSDOM(source, { contentType: 'application/xml' }).window.document;
  } catch (error) {
    throw new MarkupParseError(
      `Malformed XML in ${filePath}: ${toError(error).message}`,
      filePath,
      toError(error)
    );
  }

  if (!document.documentElement || document.getElementsByTagName('parsererror').length > 0) {
    throw new MarkupParseError(`Malformed XML in ${filePath}`, filePath);
  }
  return document;
}

/**
 * All descendant elements with the given local name, in document order
 */
export function findElements(root: Document | Element, localName: string): Element[] {
  return Array.from(root.getElementsByTagNameNS('*', localName));
}

/**
 * First descendant element with the given local name
 */
export function findElement(root: Document | Element, localName: string): Element | undefined {
  return findElements(root, localName)[0];
}

/**
 * Direct child elements, optionally filtered by local name
 */
export function childElements(parent: Element, localName?: string): Element[] {
  return Array.from(parent.children).filter(
    child => localName === undefined || child.localName === localName
  );
}

/**
 * First direct child element with the given local name
 */
export function childElement(parent: Element, localName: string): Element | undefined {
  return childElements(parent, localName)[0];
}

/**
 * True when an ancestor of `element` has the given local name
 */
export function hasAncestor(element: Element, localName: string): boolean {
  for (let parent = element.parentElement; parent; parent = parent.parentElement) {
    if (parent.localName === localName) {
      return true;
    }
  }
  return false;
}

/**
 * Trimmed text content
 */
export function elementText(element: Element | undefined): string {
  return element?.textContent?.trim() ?? '';
}

/**
 * Content of an element as a markup string.
 *
 * Elements holding only text (escaped HTML, CDATA) yield that text; elements
 * with child elements yield their serialized inner markup without namespace
 * declarations.
 */
export function elementContent(element: Element): string {
  const nodes = Array.from(element.childNodes);
  const textOnly = nodes.every(
    node => node.nodeType === TEXT_NODE || node.nodeType === CDATA_SECTION_NODE
  );
  if (textOnly) {
    return element.textContent ?? '';
  }
  return element.innerHTML.replace(NAMESPACE_DECLARATION, '');
}

/**
 * Serialized element including its own tag, without namespace declarations
 */
export function outerMarkup(element: Element): string {
  return element.outerHTML.replace(NAMESPACE_DECLARATION, '');
}

/**
 * Non-blank text nodes under `root` in document order, skipping script and
 * style content
 */
export function collectTextNodes(root: Node): Node[] {
  const collected: Node[] = [];
  const visit = (node: Node): void => {
    if (node.nodeType === TEXT_NODE || node.nodeType === CDATA_SECTION_NODE) {
      if (node.textContent && node.textContent.trim()) {
        collected.push(node);
      }
      return;
    }
    if (node.nodeType === ELEMENT_NODE && isSkippedElement(node)) {
      return;
    }
    node.childNodes.forEach(visit);
  };
  visit(root);
  return collected;
}

function isSkippedElement(node: Node): boolean {
  const name = node.nodeName.toLowerCase();
  return name === 'script' || name === 'style';
}

/**
 * Attribute value, or undefined when absent or blank
 */
export function attributeOf(element: Element | undefined, name: string): string | undefined {
  const value = element?.getAttribute(name)?.trim();
  return value ? value : undefined;
}
