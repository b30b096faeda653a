/**
 * Utility functions for generating and normalizing IDs
 */

import * as crypto from 'crypto';

/**
 * Normalizes an array of strings into a kebab-case ID
 * @example
 * normalizeId(['My', 'Module', 'Name']) // returns 'my-module-name'
 * normalizeId(['wiki_content/Intro.html']) // returns 'wiki-content-intro-html'
 */
export function normalizeId(parts: string[]): string {
  return parts
    .map(p => p.toLowerCase().replace(/[^a-z0-9]/g, '-'))
    .join('-')
    .replace(/-+/g, '-')
    .replace(/^-|-$/g, '');
}

/**
 * Identifier of content recovered from an unreferenced file.
 *
 * Depends on the relative path only, so re-runs over the same tree agree. The
 * hash suffix keeps `a_b.xml` and `a-b.xml` apart.
 * @example
 * recoveredEntityId('notes.xml') // returns 'recovered-notes-xml-<8 hex chars>'
 */
export function recoveredEntityId(relativePath: string): string {
  const digest = crypto.createHash('sha256').update(relativePath).digest('hex').slice(0, 8);
  return `recovered-${normalizeId([relativePath])}-${digest}`;
}

/**
 * Hands out unique identifiers, suffixing repeats with `~2`, `~3`, ... in the
 * order they are claimed.
 */
export class IdRegistry {
  private readonly claimed = new Set<string>();

  claim(base: string): string {
    if (!this.claimed.has(base)) {
      this.claimed.add(base);
      return base;
    }
    let counter = 2;
    while (this.claimed.has(`${base}~${counter}`)) {
      counter++;
    }
    const id = `${base}~${counter}`;
    this.claimed.add(id);
    return id;
  }

  has(id: string): boolean {
    return this.claimed.has(id);
  }
}
