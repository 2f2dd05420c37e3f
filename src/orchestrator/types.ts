/**
 * Orchestrator Type Definitions
 */

import type { ModelProvider } from '../llm/types.js';
import type { CourseStore } from '../services/courses/types.js';
import type { SessionStore } from '../services/sessions/types.js';
import type { EvidentiarySource } from '../tools/types.js';
import type { ToolRegistry } from '../tools/registry.js';

/** Answer given when no model credential is configured. */
export const NO_CREDENTIAL_ANSWER =
  'I will tell you the answer once I am plugged in (have an API key).';

/**
 * What the assistant returns for one question.
 */
export interface AnswerResult {
  answer: string;
  /** Citations for the content the answer drew on; empty when no search ran */
  sources: EvidentiarySource[];
}

export interface AnswerOptions {
  signal?: AbortSignal;
}

export interface CourseAssistantDeps {
  courseStore: CourseStore;
  sessionStore: SessionStore;
  provider: ModelProvider;

  /** Model credential; missing or blank skips the model entirely */
  apiKey?: string;

  /** Tool-use round budget (default 2) */
  maxRounds?: number;

  /** Builds the per-query tool registry (default: every course tool) */
  createRegistry?: (store: CourseStore) => ToolRegistry;
}

export interface CourseAssistant {
  /**
   * Answer a question, using and extending the session's history when a
   * session id is given. Model failures propagate.
   */
  answer(query: string, sessionId?: string, options?: AnswerOptions): Promise<AnswerResult>;
}
