/**
 * Assignment Settings Parser
 *
 * Reads `assignment_settings.xml`: title, optional description and grading
 * metadata. Dates are kept verbatim.
 */

import { AssignmentMetadata } from '../models/source-entity.model';

import { EXTRACTION_PROFILES, ExtractionOptions, extractFromDocument } from './markup-extractor';
import { elementText, findElement, parseMarkupDocument } from './xml-document';

export interface ExtractedAssignmentSettings {
  title?: string;
  description?: string;
  metadata: AssignmentMetadata;
}

/**
 * Parse an assignment settings document
 * @throws MarkupParseError on malformed XML
 */
export function extractAssignmentSettings(
  source: string,
  options: ExtractionOptions = {}
): ExtractedAssignmentSettings {
  const document = parseMarkupDocument(source, 'xml', options.filePath);
  const fields = extractFromDocument(document, EXTRACTION_PROFILES['assignment-settings'], options);

  const text = (localName: string): string | undefined => {
    const value = elementText(findElement(document, localName));
    return value ? value : undefined;
  };

  const rawPoints = text('points_possible');
  const points = rawPoints !== undefined ? Number(rawPoints) : Number.NaN;
  const metadata: AssignmentMetadata = {
    pointsPossible: Number.isFinite(points) ? points : undefined,
    dueAt: text('due_at'),
    unlockAt: text('unlock_at'),
    lockAt: text('lock_at'),
    gradingType: text('grading_type'),
    submissionTypes: (text('submission_types') ?? '')
      .split(',')
      .map(type => type.trim())
      .filter(type => type.length > 0),
  };

  return {
    title: fields.title,
    description: fields.usedFallback ? undefined : fields.body,
    metadata,
  };
}
