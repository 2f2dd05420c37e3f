/**
 * Test app factory.
 *
 * Creates an Express app instance for integration testing without starting
 * the server or listening on a port.
 */

import type express from 'express';
import { createApp } from '../../src/app.js';
import { createCourseAssistant, type CourseAssistant } from '../../src/orchestrator/index.js';
import { MemorySessionStore } from '../../src/services/sessions/memory.js';
import type { CourseStore } from '../../src/services/courses/types.js';
import type { ModelProvider } from '../../src/llm/types.js';
import { FakeCourseStore, ScriptedProvider } from './fakes.js';

export interface TestAppOptions {
  courseStore?: CourseStore;
  provider?: ModelProvider;
  assistant?: CourseAssistant;
  apiKey?: string;
  maxQueryLength?: number;
}

export interface TestApp {
  app: express.Application;
  courseStore: CourseStore;
  sessionStore: MemorySessionStore;
}

/**
 * Create a test Express app with all routes configured.
 */
export function createTestApp(options: TestAppOptions = {}): TestApp {
  const courseStore = options.courseStore ?? new FakeCourseStore();
  const sessionStore = new MemorySessionStore(2);
  const assistant = options.assistant ?? createCourseAssistant({
    courseStore,
    sessionStore,
    provider: options.provider ?? new ScriptedProvider(),
    apiKey: 'apiKey' in options ? options.apiKey : 'test-api-key',
  });

  const app = createApp({
    assistant,
    courseStore,
    sessionStore,
    maxQueryLength: options.maxQueryLength ?? 5000,
  });

  return { app, courseStore, sessionStore };
}
