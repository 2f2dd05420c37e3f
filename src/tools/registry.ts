/**
 * Tool Registry
 *
 * Name-indexed catalog of capabilities. The orchestrator advertises
 * `definitions()` to the model and runs every tool call through `dispatch()`;
 * the assistant reads `lastSources()` once per query and then resets them.
 */

import type { Capability, EvidentiarySource, ToolDispatcher, ToolSchema } from './types.js';
import { DuplicateToolError, ToolExecutionError, UnknownToolError } from '../utils/errors.js';
import { createLogger } from '../utils/observability/index.js';

const logger = createLogger({ domain: 'tool-registry' });

export class ToolRegistry implements ToolDispatcher {
  private readonly capabilities = new Map<string, Capability>();

  /** Most recent capability that records sources, by name. */
  private lastSourceOwner: string | null = null;

  /**
   * Register a capability under its schema name. Names are unique.
   */
  register(capability: Capability): void {
    const { name } = capability.schema;
    if (this.capabilities.has(name)) {
      throw new DuplicateToolError(name);
    }
    this.capabilities.set(name, capability);
  }

  /**
   * Tool schemas in registration order.
   */
  definitions(): ToolSchema[] {
    return [...this.capabilities.values()].map(c => c.schema);
  }

  names(): string[] {
    return [...this.capabilities.keys()];
  }

  async dispatch(name: string, input: Record<string, unknown>): Promise<string> {
    const capability = this.capabilities.get(name);
    if (!capability) {
      throw new UnknownToolError(name);
    }

    logger.info('tool_dispatch', { toolName: name, inputKeys: Object.keys(input) });

    let result: string;
    try {
      result = await capability.execute(input);
    } catch (error) {
      throw new ToolExecutionError(name, error);
    }

    if (capability.lastSources !== undefined) {
      this.lastSourceOwner = name;
    }
    return result;
  }

  /**
   * Sources recorded by the most recently executed source-recording
   * capability. Empty if none has run since the last reset.
   */
  lastSources(): EvidentiarySource[] {
    if (!this.lastSourceOwner) return [];
    const owner = this.capabilities.get(this.lastSourceOwner);
    return owner?.lastSources ? [...owner.lastSources] : [];
  }

  resetSources(): void {
    for (const capability of this.capabilities.values()) {
      if (capability.lastSources !== undefined) {
        capability.lastSources = [];
      }
    }
    this.lastSourceOwner = null;
  }
}
