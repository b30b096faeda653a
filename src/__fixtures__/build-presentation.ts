/**
 * Builds small PowerPoint packages for tests
 */

import { encode } from 'html-entities';
import JSZip from 'jszip';

export interface SlideFixture {
  title?: string;

  /** One entry per text shape, one string per paragraph */
  shapes?: string[][];
  notes?: string;
}

const NAMESPACES =
  'xmlns:a="http://schemas.openxmlformats.org/drawingml/2006/main" ' +
  'xmlns:p="http://schemas.openxmlformats.org/presentationml/2006/main"';

function shape(paragraphs: string[], placeholder?: string): string {
  const ph = placeholder ? `<p:ph type="${placeholder}"/>` : '';
  const body = paragraphs.map(text => `<a:p><a:r><a:t>${encode(text)}</a:t></a:r></a:p>`);
  const properties = `<p:nvSpPr><p:nvPr>${ph}</p:nvPr></p:nvSpPr>`;
  return `<p:sp>${properties}<p:txBody>${body.join('')}</p:txBody></p:sp>`;
}

export function slideXml(slide: SlideFixture): string {
  const shapes = [
    slide.title !== undefined ? shape([slide.title], 'title') : '',
    ...(slide.shapes ?? []).map(paragraphs => shape(paragraphs)),
  ];
  const tree = `<p:cSld><p:spTree>${shapes.join('')}</p:spTree></p:cSld>`;
  return `<p:sld ${NAMESPACES}>${tree}</p:sld>`;
}

function notesXml(notes: string, slideNumber: number): string {
  const shapes = shape([String(slideNumber)], 'sldNum') + shape([notes], 'body');
  return `<p:notes ${NAMESPACES}><p:cSld><p:spTree>${shapes}</p:spTree></p:cSld></p:notes>`;
}

/**
 * Zip the slides into a .pptx buffer; a title goes into docProps/core.xml
 */
export async function buildPresentation(slides: SlideFixture[], title?: string): Promise<Buffer> {
  const zip = new JSZip();
  slides.forEach((slide, index) => {
    zip.file(`ppt/slides/slide${index + 1}.xml`, slideXml(slide));
    if (slide.notes) {
      zip.file(`ppt/notesSlides/notesSlide${index + 1}.xml`, notesXml(slide.notes, index + 1));
    }
  });
  if (title) {
    zip.file(
      'docProps/core.xml',
      '<cp:coreProperties ' +
        'xmlns:cp="http://schemas.openxmlformats.org/package/2006/metadata/core-properties" ' +
        `xmlns:dc="http://purl.org/dc/elements/1.1/"><dc:title>${encode(title)}</dc:title>` +
        '</cp:coreProperties>'
    );
  }
  return zip.generateAsync({ type: 'nodebuffer' });
}
