/**
 * Cartridge export layout and vocabulary.
 *
 * File names, directories and placeholder tokens found in IMS Common Cartridge
 * exports produced by Canvas.
 */

export const MANIFEST_FILENAME = 'imsmanifest.xml';

/** Directory holding course-level settings, never content */
export const SETTINGS_DIRECTORY = 'course_settings';

/** Directory wiki pages live in */
export const WIKI_CONTENT_DIRECTORY = 'wiki_content';

/** Directory `$IMS-CC-FILEBASE$` resolves to */
export const WEB_RESOURCES_DIRECTORY = 'web_resources';

/** Files that describe the export rather than hold content */
export const SYSTEM_FILENAMES: ReadonlySet<string> = new Set([
  MANIFEST_FILENAME,
  'course_settings.xml',
  'module_meta.xml',
  'assignment_settings.xml',
  'assessment_meta.xml',
  'files_meta.xml',
  'syllabus.html',
]);

/** Directories skipped by the inventory scan regardless of configuration */
export const IGNORED_DIRECTORIES: readonly string[] = ['.git', 'node_modules'];

/** Extensions of markup documents the extractor can read */
export const MARKUP_EXTENSIONS: ReadonlySet<string> = new Set(['.xml', '.html', '.htm']);

/** Extensions parsed as HTML rather than XML */
export const HTML_EXTENSIONS: ReadonlySet<string> = new Set(['.html', '.htm']);

/** Presentation packages converted slide by slide */
export const PRESENTATION_EXTENSIONS: ReadonlySet<string> = new Set(['.pptx']);

/** Extensions of unreferenced files that recovery reads */
export const RECOVERABLE_EXTENSIONS: ReadonlySet<string> = new Set([
  ...MARKUP_EXTENSIONS,
  ...PRESENTATION_EXTENSIONS,
]);

/** Asset placeholder, plain and URL-encoded */
export const FILEBASE_TOKENS: readonly string[] = ['$IMS-CC-FILEBASE$', '%24IMS-CC-FILEBASE%24'];

/** Internal wiki link placeholder, plain and URL-encoded */
export const WIKI_REFERENCE_TOKENS: readonly string[] = [
  '$WIKI_REFERENCE$',
  '%24WIKI_REFERENCE%24',
];

/** Name of the settings document that accompanies an assignment */
export const ASSIGNMENT_SETTINGS_FILENAME = 'assignment_settings.xml';

/**
 * Source question kinds Canvas writes into QTI metadata
 */
export const SOURCE_QUESTION_KINDS = [
  'multiple_choice_question',
  'true_false_question',
  'essay_question',
  'short_answer_question',
  'fill_in_multiple_blanks_question',
  'matching_question',
  'multiple_answers_question',
  'ordering_question',
  'numerical_question',
  'calculated_question',
  'formula_question',
  'file_upload_question',
  'multiple_dropdowns_question',
  'categorization_question',
  'text_only_question',
] as const;

export type SourceQuestionKind = (typeof SOURCE_QUESTION_KINDS)[number];

/**
 * Type guard for the closed set of known source kinds
 */
export function isKnownQuestionKind(kind: string): kind is SourceQuestionKind {
  return (SOURCE_QUESTION_KINDS as readonly string[]).includes(kind);
}
