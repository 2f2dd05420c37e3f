/**
 * Course Assistant
 *
 * Single entry point for answering a question:
 * 1. Load the session's history (if any)
 * 2. Run the tool executor with a fresh tool registry
 * 3. Read the registry's sources, then reset them
 * 4. Record the exchange in the session
 */

import type { AnswerResult, CourseAssistant, CourseAssistantDeps } from './types.js';
import { NO_CREDENTIAL_ANSWER } from './types.js';
import { executeWithTools } from '../executor/tool-executor.js';
import { createToolRegistry } from '../tools/index.js';
import { createLogger } from '../utils/observability/index.js';

const logger = createLogger({ domain: 'course-assistant' });

/**
 * Wrap the user's question for the model.
 */
export function buildQueryPrompt(query: string): string {
  return `Answer this question about course materials: ${query}`;
}

export function createCourseAssistant(deps: CourseAssistantDeps): CourseAssistant {
  const createRegistry = deps.createRegistry ?? createToolRegistry;

  return {
    async answer(query, sessionId, options = {}): Promise<AnswerResult> {
      if (!deps.apiKey?.trim()) {
        logger.warn('answer_without_credential', { hasSession: Boolean(sessionId) });
        return { answer: NO_CREDENTIAL_ANSWER, sources: [] };
      }

      const history = sessionId ? await deps.sessionStore.historyFor(sessionId) : undefined;
      const registry = createRegistry(deps.courseStore);

      const result = await executeWithTools(
        {
          query: buildQueryPrompt(query),
          history,
          tools: registry.definitions(),
          dispatcher: registry,
        },
        {
          provider: deps.provider,
          maxRounds: deps.maxRounds,
          signal: options.signal,
          logger: logger.child({ sessionId }),
        }
      );

      // Read, then reset.
      const sources = registry.lastSources();
      registry.resetSources();

      if (sessionId) {
        await deps.sessionStore.append(sessionId, query, result.text);
      }

      logger.info('answer_ready', {
        state: result.state,
        rounds: result.rounds,
        modelCalls: result.modelCalls,
        sources: sources.length,
        hasHistory: history !== undefined,
      });

      return { answer: result.text, sources };
    },
  };
}
