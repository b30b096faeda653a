/**
 * Assessment Parser
 *
 * Reads QTI assessments as exported by Canvas: quiz metadata plus the embedded
 * questions in document order. QTI 1.2 is the main shape; a few QTI 2 elements
 * (`itemBody`, `simpleChoice`, `correctResponse`) are read as well.
 */

import { cleanHtml } from '../utils/html-cleaner';
import { normalizeWhitespace } from '../utils/text-formatters';

import {
  DEFAULT_ASSET_BASE_PATH,
  EXTRACTION_PROFILES,
  ExtractionOptions,
  extractFromDocument,
} from './markup-extractor';
import {
  attributeOf,
  childElement,
  childElements,
  elementContent,
  elementText,
  findElement,
  findElements,
  hasAncestor,
  outerMarkup,
  parseMarkupDocument,
} from './xml-document';

export interface ExtractedAnswer {
  id: string;
  text: string;
  correct: boolean;
}

export interface ExtractedQuestion {
  /** Item `ident`, or a positional id when absent */
  ident: string;
  title?: string;
  sourceKind: string;
  text: string;
  points: number;
  answers: ExtractedAnswer[];
  feedback?: string;
}

export interface ExtractedQuizSettings {
  timeLimitMinutes?: number;
  allowedAttempts?: number;
}

export interface ExtractedAssessment {
  title?: string;
  description: string;
  settings: ExtractedQuizSettings;
  questions: ExtractedQuestion[];
}

const DEFAULT_QUESTION_POINTS = 1;

/**
 * Parse a QTI assessment document
 * @throws MarkupParseError on malformed XML
 */
export function extractAssessment(
  source: string,
  options: ExtractionOptions = {}
): ExtractedAssessment {
  const document = parseMarkupDocument(source, 'xml', options.filePath);
  const cleanOptions = { assetBasePath: options.assetBasePath ?? DEFAULT_ASSET_BASE_PATH };

  const assessment = findElement(document, 'assessment');
  const fields = extractFromDocument(document, EXTRACTION_PROFILES.assessment, options);

  // Item titles would otherwise win the generic title lookup
  const title = attributeOf(assessment, 'title') ?? quizLevelTitle(document);

  const questions = findElements(document, 'item').map((item, index) =>
    extractQuestion(item, index, cleanOptions)
  );

  return {
    title,
    description: fields.usedFallback ? '' : fields.body,
    settings: extractQuizSettings(document),
    questions,
  };
}

/**
 * Quiz settings from an `assessment_meta.xml` style document or QTI metadata
 * @throws MarkupParseError on malformed XML
 */
export function extractQuizMeta(
  source: string,
  options: ExtractionOptions = {}
): { title?: string; description?: string; settings: ExtractedQuizSettings } {
  const document = parseMarkupDocument(source, 'xml', options.filePath);
  const fields = extractFromDocument(document, EXTRACTION_PROFILES.assessment, options);
  return {
    title: fields.title,
    description: fields.usedFallback ? undefined : fields.body,
    settings: extractQuizSettings(document),
  };
}

function quizLevelTitle(document: Document): string | undefined {
  const title = findElements(document, 'title').find(
    element => !hasAncestor(element, 'item') && elementText(element)
  );
  return title ? normalizeWhitespace(elementText(title)) : undefined;
}

function extractQuizSettings(document: Document): ExtractedQuizSettings {
  const root = document.documentElement;
  const quizMetadata = readMetadataFields(
    findElements(document, 'qtimetadatafield').filter(field => !hasAncestor(field, 'item'))
  );

  const timeLimit = parseNumber(
    quizMetadata.get('qmd_timelimit') ?? elementText(findElement(root, 'time_limit'))
  );
  const attempts = parseNumber(
    quizMetadata.get('cc_maxattempts') ?? elementText(findElement(root, 'allowed_attempts'))
  );

  const settings: ExtractedQuizSettings = {};
  if (timeLimit !== undefined && timeLimit > 0) {
    settings.timeLimitMinutes = timeLimit;
  }
  // Canvas writes -1 for unlimited attempts
  if (attempts !== undefined && attempts > 0) {
    settings.allowedAttempts = Math.floor(attempts);
  }
  return settings;
}

function extractQuestion(
  item: Element,
  index: number,
  cleanOptions: { assetBasePath: string }
): ExtractedQuestion {
  const metadata = readMetadataFields(findElements(item, 'qtimetadatafield'));
  const sourceKind =
    metadata.get('question_type') ||
    elementText(findElement(item, 'question_type')) ||
    inferKind(item);

  const points = parseNumber(metadata.get('points_possible'));
  const correctIds = collectCorrectIds(item);

  const answers: ExtractedAnswer[] = [
    ...findElements(item, 'response_label'),
    ...findElements(item, 'simpleChoice'),
  ].map((choice, position) => {
    const id =
      attributeOf(choice, 'ident') ?? attributeOf(choice, 'identifier') ?? `${position + 1}`;
    const mattext = findElement(choice, 'mattext');
    return {
      id,
      text: cleanHtml(mattext ? elementContent(mattext) : elementContent(choice), cleanOptions),
      correct: correctIds.has(id),
    };
  });

  const feedback = extractFeedback(item);

  return {
    ident: attributeOf(item, 'ident') ?? attributeOf(item, 'identifier') ?? `question-${index + 1}`,
    title: attributeOf(item, 'title'),
    sourceKind,
    text: cleanHtml(extractQuestionText(item), cleanOptions),
    points: points !== undefined && points >= 0 ? points : DEFAULT_QUESTION_POINTS,
    answers,
    feedback: feedback ? cleanHtml(feedback, cleanOptions) : undefined,
  };
}

function extractQuestionText(item: Element): string {
  const presentation = findElement(item, 'presentation');
  const material = presentation ? childElement(presentation, 'material') : undefined;
  const mattext = material ? childElement(material, 'mattext') : undefined;
  if (mattext && elementContent(mattext).trim()) {
    return elementContent(mattext);
  }

  const itemBody = findElement(item, 'itemBody');
  if (itemBody) {
    // Choices are read separately
    const blocks = childElements(itemBody).filter(child => child.localName !== 'choiceInteraction');
    return blocks.length > 0 ? blocks.map(outerMarkup).join('') : elementContent(itemBody);
  }

  const questionText = findElement(item, 'question_text');
  return questionText ? elementContent(questionText) : '';
}

/**
 * Idents set to a positive score by a response condition
 */
function collectCorrectIds(item: Element): Set<string> {
  const ids = new Set<string>();
  for (const condition of findElements(item, 'respcondition')) {
    const scores = findElements(condition, 'setvar').map(setvar =>
      parseNumber(elementText(setvar))
    );
    if (!scores.some(score => score !== undefined && score > 0)) {
      continue;
    }
    for (const varequal of findElements(condition, 'varequal')) {
      const value = elementText(varequal);
      if (value) {
        ids.add(value);
      }
    }
  }
  for (const correct of findElements(item, 'correctResponse')) {
    for (const value of childElements(correct, 'value')) {
      ids.add(elementText(value));
    }
  }
  return ids;
}

function extractFeedback(item: Element): string | undefined {
  const feedbacks = findElements(item, 'itemfeedback');
  const general = feedbacks.find(fb => attributeOf(fb, 'ident') === 'general_fb') ?? feedbacks[0];
  if (!general) {
    return undefined;
  }
  const mattext = findElement(general, 'mattext');
  const content = mattext ? elementContent(mattext) : elementContent(general);
  return content.trim() ? content : undefined;
}

function inferKind(item: Element): string {
  const lid = findElement(item, 'response_lid');
  if (lid) {
    return attributeOf(lid, 'rcardinality')?.toLowerCase() === 'multiple'
      ? 'multiple_answers_question'
      : 'multiple_choice_question';
  }
  if (findElement(item, 'response_str')) {
    return 'short_answer_question';
  }
  return 'unknown';
}

/**
 * `qtimetadatafield` label/entry pairs; the first occurrence of a label wins
 */
function readMetadataFields(fields: Element[]): Map<string, string> {
  const entries = new Map<string, string>();
  for (const field of fields) {
    const label = elementText(childElement(field, 'fieldlabel'));
    if (label && !entries.has(label)) {
      entries.set(label, elementText(childElement(field, 'fieldentry')));
    }
  }
  return entries;
}

function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}
