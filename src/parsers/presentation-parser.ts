/**
 * Presentation Parser
 *
 * Turns a PowerPoint package into lesson markup: one section per slide with
 * its title, text blocks and speaker notes. Images and layout are not kept.
 */

import { encode } from 'html-entities';
import JSZip from 'jszip';

import { normalizeWhitespace } from '../utils/text-formatters';

import { ExtractedMarkup, ExtractionOptions } from './markup-extractor';
import { MarkupParseError, toError } from './parser-result';
import {
  attributeOf,
  elementText,
  findElement,
  findElements,
  parseMarkupDocument,
} from './xml-document';

const SLIDE_ENTRY_PATTERN = /^ppt\/slides\/slide(\d+)\.xml$/;

/** Placeholder types that hold a slide title */
const TITLE_PLACEHOLDERS: ReadonlySet<string> = new Set(['title', 'ctrTitle']);

/**
 * Extract a presentation package
 * @throws MarkupParseError when the data is not a zip package or a slide is malformed
 */
export async function extractPresentation(
  data: Uint8Array,
  options: ExtractionOptions = {}
): Promise<ExtractedMarkup> {
  const filePath = options.filePath ?? '<inline>';

  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(data);
  } catch (error) {
    const cause = toError(error);
    throw new MarkupParseError(
      `Not a presentation package: ${filePath}: ${cause.message}`,
      filePath,
      cause
    );
  }

  const readEntry = async (name: string): Promise<Document | undefined> => {
    const entry = zip.file(name);
    if (!entry) {
      return undefined;
    }
    return parseMarkupDocument(await entry.async('string'), 'xml', `${filePath}:${name}`);
  };

  // Slides sort by number, not by name
  const slides = zip
    .file(SLIDE_ENTRY_PATTERN)
    .map(entry => ({ name: entry.name, number: slideNumber(entry.name) }))
    .sort((a, b) => a.number - b.number);

  const sections: string[] = [];
  for (const slide of slides) {
    const document = await readEntry(slide.name);
    const notes = await readEntry(`ppt/notesSlides/notesSlide${slide.number}.xml`);
    if (document) {
      sections.push(renderSlide(document, notes, slide.number));
    }
  }

  const core = await readEntry('docProps/core.xml');
  const title = core ? normalizeWhitespace(elementText(findElement(core, 'title'))) : '';

  return {
    title: title || undefined,
    body: sections.join(''),
    usedFallback: false,
  };
}

function slideNumber(entryName: string): number {
  return Number(SLIDE_ENTRY_PATTERN.exec(entryName)?.[1] ?? 0);
}

function renderSlide(slide: Document, notes: Document | undefined, number: number): string {
  let heading = '';
  const blocks: string[] = [];

  for (const shape of findElements(slide, 'sp')) {
    const paragraphs = shapeParagraphs(shape);
    if (paragraphs.length === 0) {
      continue;
    }
    if (!heading && TITLE_PLACEHOLDERS.has(placeholderType(shape) ?? '')) {
      heading = `<h2>${encode(paragraphs.join(' '))}</h2>`;
    } else if (paragraphs.length === 1) {
      blocks.push(`<p>${encode(paragraphs[0])}</p>`);
    } else {
      blocks.push(`<ul>${paragraphs.map(text => `<li>${encode(text)}</li>`).join('')}</ul>`);
    }
  }

  const noteText = notes
    ? findElements(notes, 'sp')
        .filter(shape => placeholderType(shape) === 'body')
        .flatMap(shapeParagraphs)
        .join(' ')
    : '';
  const aside = noteText ? `<aside class="slide-notes">${encode(noteText)}</aside>` : '';

  const content = `${heading}${blocks.join('')}${aside}`;
  return `<section class="slide" id="slide-${number}">${content}</section>`;
}

function placeholderType(shape: Element): string | undefined {
  return attributeOf(findElement(shape, 'ph'), 'type');
}

/**
 * Non-blank text paragraphs of a shape
 */
function shapeParagraphs(shape: Element): string[] {
  return findElements(shape, 'p')
    .map(paragraph =>
      normalizeWhitespace(
        findElements(paragraph, 't')
          .map(run => run.textContent ?? '')
          .join('')
      )
    )
    .filter(text => text.length > 0);
}
