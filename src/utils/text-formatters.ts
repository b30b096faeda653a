/**
 * Utility functions for text formatting
 */

import * as path from 'path';

/**
 * Format text with multiple delimiters (hyphens and underscores)
 * @example
 * formatWithDelimiters('my-module_name') // returns 'My Module Name'
 */
export function formatWithDelimiters(text: string): string {
  return text
    .replace(/[-_]/g, ' ')
    .split(' ')
    .filter(word => word.length > 0)
    .map(word => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

/**
 * Turn a file path into a readable title: directory and extension dropped,
 * delimiters become spaces.
 * @example
 * humanizeFileName('wiki_content/week_1-overview.html') // returns 'Week 1 Overview'
 */
export function humanizeFileName(filePath: string): string {
  const base = path.posix.basename(filePath.replace(/\\/g, '/'));
  const extension = path.posix.extname(base);
  const stem = extension ? base.slice(0, -extension.length) : base;
  return formatWithDelimiters(stem);
}

/**
 * Collapse whitespace runs to single spaces and trim
 */
export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}
