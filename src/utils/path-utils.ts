/**
 * Relative path helpers.
 *
 * Manifest hrefs, inventory entries and asset references are all compared as
 * URL-decoded POSIX paths relative to the course root.
 */

import * as path from 'path';

/**
 * URL-decode, keeping the input when it is not valid percent-encoding
 */
export function safeDecodeURIComponent(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

/**
 * Normalize a manifest href or file path to a relative POSIX path
 * @example
 * normalizeRelativePath('./wiki_content\\My%20Page.html') // returns 'wiki_content/My Page.html'
 */
export function normalizeRelativePath(href: string): string {
  const withoutQuery = href.split(/[?#]/)[0];
  const decoded = safeDecodeURIComponent(withoutQuery).replace(/\\/g, '/');
  if (!decoded) {
    return '';
  }
  const normalized = path.posix.normalize(decoded).replace(/^(\.\/)+/, '');
  return normalized === '.' ? '' : normalized.replace(/^\/+/, '');
}

/**
 * Lowercased extension including the dot
 */
export function extensionOf(filePath: string): string {
  return path.posix.extname(filePath).toLowerCase();
}

/**
 * Last path segment
 */
export function baseNameOf(filePath: string): string {
  return path.posix.basename(filePath);
}
