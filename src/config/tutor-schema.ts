/**
 * Tutor target defaults.
 *
 * Settings every quiz and assignment starts from before source values are
 * overlaid.
 */

import { TargetAssignmentSettings, TargetQuizSettings } from '../models/target-entity.model';

export const DEFAULT_QUIZ_SETTINGS: Readonly<TargetQuizSettings> = {
  timeLimit: { timeValue: 0, timeType: 'minutes' },
  attemptsAllowed: 10,
  passingGrade: 80,
  maxQuestionsForAnswer: 10,
  questionLayoutView: 'single_question',
  questionsOrder: 'sorting',
  feedbackMode: 'default',
};

export const DEFAULT_ASSIGNMENT_SETTINGS: Readonly<TargetAssignmentSettings> = {
  totalMark: 0,
  passMark: 0,
  dueAt: null,
  uploadFilesLimit: 1,
  uploadFileSizeLimitMb: 2,
};

/** Title of the synthetic module holding recovered content */
export const RECOVERED_MODULE_TITLE = 'Recovered Content';

/** Identifier of the synthetic module holding recovered content */
export const RECOVERED_MODULE_ID = 'recovered-content';

/** Title of the synthetic module holding resources no module places */
export const UNPLACED_MODULE_TITLE = 'Unplaced Content';

export const UNPLACED_MODULE_ID = 'unplaced-content';
