/**
 * Type definitions for the language-model boundary.
 *
 * The orchestrator speaks this provider-neutral shape; the Anthropic
 * provider translates it to and from SDK messages.
 */

import type { ToolSchema } from '../tools/types.js';

// ============================================================================
// Content Blocks
// ============================================================================

/** Plain text produced by the model. */
export interface TextBlock {
  type: 'text';
  text: string;
}

/** The model asking for a tool to be run. Never produced by us. */
export interface ToolUseBlock {
  type: 'tool_use';
  /** Unique within one assistant turn */
  id: string;
  name: string;
  input: Record<string, unknown>;
}

export type ContentBlock = TextBlock | ToolUseBlock;

/**
 * Result of one tool invocation, correlated by id. Missing `content` means
 * the tool had nothing usable to say; failures never become entries.
 */
export interface ToolResultEntry {
  toolUseId: string;
  content?: string;
}

// ============================================================================
// Transcript
// ============================================================================

export interface UserTurn {
  role: 'user';
  content: string;
}

export interface AssistantTurn {
  role: 'assistant';
  content: ContentBlock[];
}

/**
 * Tool results for the assistant turn right before it, one entry per
 * tool_use block, in the same order.
 */
export interface ToolTurn {
  role: 'tool';
  results: ToolResultEntry[];
}

export type TranscriptTurn = UserTurn | AssistantTurn | ToolTurn;

// ============================================================================
// Provider
// ============================================================================

export type ToolChoice = 'auto' | 'none';

export type StopReason = 'end_turn' | 'tool_use' | 'max_tokens' | 'stop_sequence' | 'unknown';

export interface ModelRequest {
  system: string;
  transcript: TranscriptTurn[];
  /** Ignored unless toolChoice is 'auto' */
  tools?: ToolSchema[];
  toolChoice: ToolChoice;
}

export interface ModelReply {
  stopReason: StopReason;
  content: ContentBlock[];
}

/**
 * Anything that can turn a transcript into the model's next reply.
 */
export interface ModelProvider {
  createMessage(request: ModelRequest, signal?: AbortSignal): Promise<ModelReply>;
}
