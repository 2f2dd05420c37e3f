/**
 * Tool Executor Type Definitions
 */

import type { ModelProvider, ToolUseBlock } from '../llm/types.js';
import type { ToolDispatcher, ToolSchema } from '../tools/types.js';
import type { AppLogger } from '../utils/observability/index.js';

/** Default tool-use round budget per query. */
export const DEFAULT_MAX_ROUNDS = 2;

/** Returned when the model's final reply holds no text block. */
export const NO_TEXT_RESPONSE = 'No text response available';

/** Returned when a tool fails and the model said nothing before calling it. */
export const TOOL_ERROR_MESSAGE =
  'I encountered an error while searching for information. Please try rephrasing your question.';

/**
 * Where the round loop is. The three TERMINATED_* states are final.
 */
export type ExecutorState =
  | 'AWAITING_MODEL'
  | 'DISPATCHING_TOOLS'
  | 'TERMINATED_TEXT'
  | 'TERMINATED_ERROR'
  | 'TERMINATED_MAX_ROUNDS';

export type TerminalState = Extract<ExecutorState, `TERMINATED_${string}`>;

export interface ExecuteRequest {
  /** The user turn sent to the model */
  query: string;

  /** Prior conversation, appended to the system prompt */
  history?: string;

  /** Tools to offer. Empty means the model gets no tool choice. */
  tools: ToolSchema[];

  dispatcher: ToolDispatcher;
}

export interface ExecuteOptions {
  provider: ModelProvider;

  /** Tool-use rounds before the forced text-only call (default 2) */
  maxRounds?: number;

  /** Forwarded to every model call */
  signal?: AbortSignal;

  logger?: AppLogger;
}

/**
 * Final answer plus what it took to get there.
 */
export interface ExecuteResult {
  text: string;
  state: TerminalState;

  /** Tool-use rounds whose dispatch started */
  rounds: number;

  modelCalls: number;

  /** Every tool call the model made, in order */
  toolCalls: ToolUseBlock[];
}
