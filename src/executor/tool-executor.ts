/**
 * Tool Executor
 *
 * The bounded tool loop behind every answer:
 * 1. Send the query to the model with the tool catalog offered
 * 2. If the reply asks for tools, run them in order and send the results back
 * 3. Repeat until the model answers in text or the round budget is spent
 * 4. On the last round, ask once more with no tools so the model must answer
 *
 * A tool failure ends the query with the model's own text from that reply,
 * or a fixed apology; the raw error never reaches the user. Model failures
 * propagate to the caller.
 */

import type {
  ModelReply,
  ToolResultEntry,
  ToolUseBlock,
  TranscriptTurn,
} from '../llm/types.js';
import { buildSystemPrompt } from '../services/anthropic/prompts/system.js';
import { createLogger, safeSnippet } from '../utils/observability/index.js';
import { errorMessage } from '../utils/errors.js';
import {
  DEFAULT_MAX_ROUNDS,
  NO_TEXT_RESPONSE,
  TOOL_ERROR_MESSAGE,
  type ExecuteOptions,
  type ExecuteRequest,
  type ExecuteResult,
  type ExecutorState,
  type TerminalState,
} from './types.js';

const defaultLogger = createLogger({ domain: 'tool-executor' });

/**
 * Text of the first text block, if the reply has one.
 */
export function firstText(reply: ModelReply): string | undefined {
  for (const block of reply.content) {
    if (block.type === 'text') return block.text;
  }
  return undefined;
}

export function toolUseBlocks(reply: ModelReply): ToolUseBlock[] {
  return reply.content.filter(
    (block): block is ToolUseBlock => block.type === 'tool_use'
  );
}

/**
 * Answer `request.query`, letting the model call tools for up to
 * `maxRounds` rounds.
 *
 * At most `maxRounds + 1` model calls are made. Tool calls within a round
 * run one at a time in the order the model listed them.
 */
export async function executeWithTools(
  request: ExecuteRequest,
  options: ExecuteOptions
): Promise<ExecuteResult> {
  const { provider, signal } = options;
  const maxRounds = options.maxRounds ?? DEFAULT_MAX_ROUNDS;
  const logger = options.logger ?? defaultLogger;

  if (!Number.isInteger(maxRounds) || maxRounds < 1) {
    throw new RangeError(`maxRounds must be a positive integer, got ${maxRounds}`);
  }

  const system = buildSystemPrompt(request.history, maxRounds);
  const transcript: TranscriptTurn[] = [{ role: 'user', content: request.query }];
  const offerTools = request.tools.length > 0;
  const toolCalls: ToolUseBlock[] = [];
  let modelCalls = 0;
  let state: ExecutorState = 'AWAITING_MODEL';

  const transition = (next: ExecutorState, data: Record<string, unknown> = {}): void => {
    logger.debug('executor_transition', { from: state, to: next, ...data });
    state = next;
  };

  const callModel = async (withTools: boolean): Promise<ModelReply> => {
    signal?.throwIfAborted();
    transition('AWAITING_MODEL', { modelCall: modelCalls + 1, withTools });
    modelCalls++;
    const startTime = Date.now();
    const reply = await provider.createMessage(
      {
        system,
        transcript: [...transcript],
        tools: withTools ? request.tools : undefined,
        toolChoice: withTools ? 'auto' : 'none',
      },
      signal
    );
    logger.info('model_reply', {
      modelCall: modelCalls,
      stopReason: reply.stopReason,
      blocks: reply.content.length,
      durationMs: Date.now() - startTime,
    });
    return reply;
  };

  const finish = (terminal: TerminalState, text: string, rounds: number): ExecuteResult => {
    transition(terminal);
    logger.info('executor_finished', { state: terminal, rounds, modelCalls, toolCalls: toolCalls.length });
    return { text, state: terminal, rounds, modelCalls, toolCalls };
  };

  let reply = await callModel(offerTools);

  for (let round = 1; ; round++) {
    // With no catalog offered there is nothing to dispatch to.
    const invocations = offerTools ? toolUseBlocks(reply) : [];
    if (invocations.length === 0) {
      return finish('TERMINATED_TEXT', firstText(reply) ?? NO_TEXT_RESPONSE, round - 1);
    }

    transition('DISPATCHING_TOOLS', { round, invocations: invocations.length });
    transcript.push({ role: 'assistant', content: reply.content });
    toolCalls.push(...invocations);

    const results: ToolResultEntry[] = [];
    for (const invocation of invocations) {
      try {
        const content = await request.dispatcher.dispatch(invocation.name, invocation.input);
        results.push(content ? { toolUseId: invocation.id, content } : { toolUseId: invocation.id });
      } catch (error) {
        logger.warn('tool_round_failed', {
          round,
          toolName: invocation.name,
          error: safeSnippet(errorMessage(error)),
        });
        return finish('TERMINATED_ERROR', firstText(reply) || TOOL_ERROR_MESSAGE, round);
      }
    }

    transcript.push({ role: 'tool', results });

    if (round >= maxRounds) {
      const final = await callModel(false);
      return finish('TERMINATED_MAX_ROUNDS', firstText(final) ?? NO_TEXT_RESPONSE, round);
    }

    reply = await callModel(true);
  }
}
