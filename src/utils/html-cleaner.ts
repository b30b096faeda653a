/**
 * HTML Cleaner
 *
 * Normalizes HTML payloads pulled out of cartridge documents: escaped markup is
 * unescaped once, whitespace is collapsed and asset placeholders are pointed at
 * the target asset path.
 */

import { decode } from 'html-entities';

import { FILEBASE_TOKENS } from '../config/cartridge-schema';

/** Raw tag opener, e.g. `<p`, `</div`, `<!--` */
const RAW_TAG_PATTERN = /<[a-zA-Z/!]/;

/** Escaped tag opener, e.g. `&lt;p` */
const ESCAPED_TAG_PATTERN = /&lt;[a-zA-Z/!]/;

export interface CleanHtmlOptions {
  /** Replacement for `$IMS-CC-FILEBASE$` */
  assetBasePath: string;
}

/**
 * True when the payload is HTML stored as escaped text
 */
export function isEscapedMarkup(payload: string): boolean {
  return !RAW_TAG_PATTERN.test(payload) && ESCAPED_TAG_PATTERN.test(payload);
}

/**
 * Replace every asset placeholder, plain or URL-encoded, with the asset path
 * @example
 * rewriteFilebaseTokens('<img src="$IMS-CC-FILEBASE$/a.png">', '../../assets')
 * // returns '<img src="../../assets/a.png">'
 */
export function rewriteFilebaseTokens(html: string, assetBasePath: string): string {
  let result = html;
  for (const token of FILEBASE_TOKENS) {
    result = result.split(token).join(assetBasePath);
  }
  return result;
}

/**
 * Clean an HTML payload. Running it twice gives the same result as once.
 */
export function cleanHtml(payload: string, options: CleanHtmlOptions): string {
  const unescaped = isEscapedMarkup(payload) ? decode(payload) : payload;
  const collapsed = unescaped.replace(/\s+/g, ' ').trim();
  return rewriteFilebaseTokens(collapsed, options.assetBasePath);
}

/**
 * Visible text of an HTML fragment, tags dropped and entities decoded
 */
export function htmlToText(html: string): string {
  return decode(html.replace(/<[^>]*>/g, ' '))
    .replace(/\s+/g, ' ')
    .trim();
}
