/**
 * Orchestrator: the course assistant façade.
 */

export { createCourseAssistant, buildQueryPrompt } from './handler.js';
export { NO_CREDENTIAL_ANSWER } from './types.js';
export type { AnswerResult, AnswerOptions, CourseAssistant, CourseAssistantDeps } from './types.js';
