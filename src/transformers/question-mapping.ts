/**
 * Question Kind Mapping
 *
 * Static table from Canvas question kinds to Tutor question kinds. Kinds Tutor
 * has no equivalent for land on the closest kind and are flagged for review.
 */

import {
  SOURCE_QUESTION_KINDS,
  SourceQuestionKind,
  isKnownQuestionKind,
} from '../config/cartridge-schema';
import { MappingConfidence, TargetQuestionKind } from '../models/target-entity.model';

export interface MappingRule {
  readonly targetKind: TargetQuestionKind;
  readonly confidence: MappingConfidence;
}

export const QUESTION_KIND_MAPPINGS: Readonly<Record<SourceQuestionKind, MappingRule>> = {
  multiple_choice_question: { targetKind: 'multiple_choice', confidence: 'direct' },
  true_false_question: { targetKind: 'true_false', confidence: 'direct' },
  essay_question: { targetKind: 'open_ended', confidence: 'direct' },
  short_answer_question: { targetKind: 'short_answer', confidence: 'direct' },
  fill_in_multiple_blanks_question: { targetKind: 'fill_in_the_blank', confidence: 'direct' },
  matching_question: { targetKind: 'matching', confidence: 'direct' },
  multiple_answers_question: { targetKind: 'multiple_choice', confidence: 'direct' },
  ordering_question: { targetKind: 'ordering', confidence: 'direct' },
  numerical_question: { targetKind: 'short_answer', confidence: 'fallback-requires-review' },
  calculated_question: { targetKind: 'open_ended', confidence: 'fallback-requires-review' },
  formula_question: { targetKind: 'open_ended', confidence: 'fallback-requires-review' },
  file_upload_question: { targetKind: 'open_ended', confidence: 'fallback-requires-review' },
  multiple_dropdowns_question: {
    targetKind: 'multiple_choice',
    confidence: 'fallback-requires-review',
  },
  categorization_question: { targetKind: 'matching', confidence: 'fallback-requires-review' },
  text_only_question: { targetKind: 'open_ended', confidence: 'fallback-requires-review' },
};

/** Rule applied to kinds outside the table */
export const UNKNOWN_KIND_RULE: MappingRule = {
  targetKind: 'open_ended',
  confidence: 'fallback-requires-review',
};

/**
 * Map a source question kind. Total: every string yields a rule.
 */
export function mapQuestionKind(sourceKind: string): MappingRule {
  return isKnownQuestionKind(sourceKind) ? QUESTION_KIND_MAPPINGS[sourceKind] : UNKNOWN_KIND_RULE;
}

/**
 * Table rows in declaration order, for display
 */
export function listQuestionKindMappings(): Array<{ sourceKind: string } & MappingRule> {
  return SOURCE_QUESTION_KINDS.map(sourceKind => ({
    sourceKind,
    ...QUESTION_KIND_MAPPINGS[sourceKind],
  }));
}
