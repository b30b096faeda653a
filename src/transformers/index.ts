/**
 * Transformers convert the resolved source course into the target graph
 *
 * - course-transformer: modules to topics, content to lessons, quizzes and assignments
 * - question-mapping: source question kinds to target kinds
 */

export * from './course-transformer';
export * from './question-mapping';
