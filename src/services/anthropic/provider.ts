/**
 * Anthropic implementation of the model provider.
 *
 * Translates the provider-neutral transcript into Messages API params:
 * - user turn       → { role: 'user', content: string }
 * - assistant turn  → { role: 'assistant', content: [text | tool_use] }
 * - tool turn       → { role: 'user', content: [tool_result, ...] }
 *
 * Tools and `tool_choice: auto` are only sent when tools are offered;
 * leaving both out is how the final call forces a text answer.
 */

import Anthropic from '@anthropic-ai/sdk';
import type {
  ContentBlock as SdkContentBlock,
  ContentBlockParam,
  MessageCreateParamsNonStreaming,
  MessageParam,
  Tool,
  ToolResultBlockParam,
} from '@anthropic-ai/sdk/resources/messages';

import type {
  ContentBlock,
  ModelProvider,
  ModelReply,
  ModelRequest,
  StopReason,
  TranscriptTurn,
} from '../../llm/types.js';
import type { ToolSchema } from '../../tools/types.js';
import config from '../../config.js';

let sharedClient: Anthropic | null = null;

/**
 * Lazily built SDK client for the configured key. Throws when no key is set,
 * which the HTTP layer reports as the AI service being unavailable.
 */
export function getClient(): Anthropic {
  if (!sharedClient) {
    if (!config.anthropicApiKey) {
      throw new Error('ANTHROPIC_API_KEY not configured');
    }
    sharedClient = new Anthropic({ apiKey: config.anthropicApiKey });
  }
  return sharedClient;
}

/** Drop the shared client. Useful for tests. */
export function resetClient(): void {
  sharedClient = null;
}

export interface AnthropicProviderSettings {
  model: string;
  maxTokens: number;
  temperature: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toContentParam(block: ContentBlock): ContentBlockParam {
  if (block.type === 'text') {
    return { type: 'text', text: block.text };
  }
  return { type: 'tool_use', id: block.id, name: block.name, input: block.input };
}

function toMessageParam(turn: TranscriptTurn): MessageParam {
  switch (turn.role) {
    case 'user':
      return { role: 'user', content: turn.content };
    case 'assistant':
      return { role: 'assistant', content: turn.content.map(toContentParam) };
    case 'tool': {
      const results: ToolResultBlockParam[] = turn.results.map(entry =>
        entry.content !== undefined
          ? { type: 'tool_result', tool_use_id: entry.toolUseId, content: entry.content }
          : { type: 'tool_result', tool_use_id: entry.toolUseId }
      );
      return { role: 'user', content: results };
    }
  }
}

export function toMessageParams(transcript: TranscriptTurn[]): MessageParam[] {
  return transcript.map(toMessageParam);
}

function toSdkTool(schema: ToolSchema): Tool {
  return {
    name: schema.name,
    description: schema.description,
    input_schema: {
      type: 'object',
      properties: schema.input_schema.properties,
      required: schema.input_schema.required,
    },
  };
}

/**
 * Keep text and tool_use blocks; drop anything else the API may add.
 */
export function fromResponseContent(content: SdkContentBlock[]): ContentBlock[] {
  const blocks: ContentBlock[] = [];
  for (const block of content) {
    if (block.type === 'text') {
      blocks.push({ type: 'text', text: block.text });
    } else if (block.type === 'tool_use') {
      blocks.push({
        type: 'tool_use',
        id: block.id,
        name: block.name,
        input: isRecord(block.input) ? block.input : {},
      });
    }
  }
  return blocks;
}

function toStopReason(reason: string | null | undefined): StopReason {
  switch (reason) {
    case 'end_turn':
    case 'tool_use':
    case 'max_tokens':
    case 'stop_sequence':
      return reason;
    default:
      return 'unknown';
  }
}

export class AnthropicModelProvider implements ModelProvider {
  private readonly settings: AnthropicProviderSettings;

  /**
   * The client is resolved on each call, so constructing a provider never
   * requires a configured key.
   */
  constructor(
    settings: Partial<AnthropicProviderSettings> = {},
    private readonly clientFactory: () => Anthropic = getClient
  ) {
    this.settings = {
      model: settings.model ?? config.model.id,
      maxTokens: settings.maxTokens ?? config.model.maxTokens,
      temperature: settings.temperature ?? config.model.temperature,
    };
  }

  async createMessage(request: ModelRequest, signal?: AbortSignal): Promise<ModelReply> {
    const params: MessageCreateParamsNonStreaming = {
      model: this.settings.model,
      max_tokens: this.settings.maxTokens,
      temperature: this.settings.temperature,
      system: request.system,
      messages: toMessageParams(request.transcript),
    };

    if (request.toolChoice === 'auto' && request.tools && request.tools.length > 0) {
      params.tools = request.tools.map(toSdkTool);
      params.tool_choice = { type: 'auto' };
    }

    const response = await this.clientFactory().messages.create(params, { signal });

    return {
      stopReason: toStopReason(response.stop_reason),
      content: fromResponseContent(response.content),
    };
  }
}
