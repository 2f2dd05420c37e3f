/**
 * @fileoverview Express server entry point for the course materials assistant.
 *
 * Validates configuration, opens the course and session stores, indexes the
 * course documents folder, then serves the HTTP API.
 */

import config, { validateConfig } from './config.js';

// Fail fast if critical configuration is missing
validateConfig();

import { createApp } from './app.js';
import { createCourseAssistant } from './orchestrator/index.js';
import { AnthropicModelProvider } from './services/anthropic/index.js';
import { closeCourseStore, getCourseStore, loadCourseFolder } from './services/courses/index.js';
import { closeSessionStore, getSessionStore } from './services/sessions/index.js';
import { createLogger, initObservability } from './utils/observability/index.js';
import { errorMessage } from './utils/errors.js';

initObservability();

const logger = createLogger({ domain: 'server' });

const courseStore = getCourseStore();
const sessionStore = getSessionStore();

const assistant = createCourseAssistant({
  courseStore,
  sessionStore,
  provider: new AnthropicModelProvider(),
  apiKey: config.anthropicApiKey,
  maxRounds: config.orchestrator.maxToolRounds,
});

const app = createApp({
  assistant,
  courseStore,
  sessionStore,
  maxQueryLength: config.api.maxQueryLength,
});

try {
  await loadCourseFolder(config.courses.docsPath, courseStore, {
    chunkSize: config.courses.chunkSize,
    chunkOverlap: config.courses.chunkOverlap,
  });
} catch (error) {
  logger.error('course_folder_load_failed', { error: errorMessage(error) });
}

const server = app.listen(config.port, () => {
  logger.info('server_started', {
    port: config.port,
    env: config.nodeEnv,
    hasApiKey: Boolean(config.anthropicApiKey),
    sessionProvider: config.sessions.provider,
  });
});

let isShuttingDown = false;

// Graceful shutdown
function shutdown(signal: string): void {
  if (isShuttingDown) {
    return;
  }
  isShuttingDown = true;
  logger.info('shutdown_signal_received', { signal });

  const forceExitTimer = setTimeout(() => {
    logger.warn('shutdown_forced', { timeoutMs: 10000 });
    process.exit(1);
  }, 10000);

  server.close(() => {
    clearTimeout(forceExitTimer);
    closeSessionStore();
    closeCourseStore();
    logger.info('server_closed');
    process.exit(0);
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
