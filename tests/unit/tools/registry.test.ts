/**
 * Unit tests for the tool registry.
 *
 * Tests registration, dispatch and source bookkeeping.
 */

import { describe, it, expect } from 'vitest';
import { ToolRegistry } from '../../../src/tools/registry.js';
import { createToolRegistry } from '../../../src/tools/index.js';
import type { Capability, EvidentiarySource, ToolSchema } from '../../../src/tools/types.js';
import {
  DuplicateToolError,
  ToolExecutionError,
  UnknownToolError,
} from '../../../src/utils/errors.js';
import { FakeCourseStore } from '../../helpers/fakes.js';

function schemaFor(name: string): ToolSchema {
  return {
    name,
    description: `${name} tool`,
    input_schema: { type: 'object', properties: {}, required: [] },
  };
}

class EchoTool implements Capability {
  readonly schema: ToolSchema;
  constructor(name: string) {
    this.schema = schemaFor(name);
  }
  async execute(input: Record<string, unknown>): Promise<string> {
    return `echo:${JSON.stringify(input)}`;
  }
}

class SourcingTool implements Capability {
  readonly schema: ToolSchema;
  lastSources: EvidentiarySource[] = [];
  constructor(name: string, private readonly sources: EvidentiarySource[]) {
    this.schema = schemaFor(name);
  }
  async execute(): Promise<string> {
    this.lastSources = [...this.sources];
    return 'content';
  }
}

class FailingTool implements Capability {
  readonly schema = schemaFor('failing');
  async execute(): Promise<string> {
    throw new Error('disk on fire');
  }
}

describe('ToolRegistry', () => {
  it('lists definitions in registration order', () => {
    const registry = new ToolRegistry();
    registry.register(new EchoTool('b'));
    registry.register(new EchoTool('a'));

    expect(registry.definitions().map(d => d.name)).toEqual(['b', 'a']);
    expect(registry.names()).toEqual(['b', 'a']);
  });

  it('has no definitions when empty', () => {
    expect(new ToolRegistry().definitions()).toEqual([]);
  });

  it('rejects a duplicate name', () => {
    const registry = new ToolRegistry();
    registry.register(new EchoTool('echo'));

    expect(() => registry.register(new EchoTool('echo'))).toThrow(DuplicateToolError);
    expect(registry.definitions()).toHaveLength(1);
  });

  it('dispatches to the named capability', async () => {
    const registry = new ToolRegistry();
    registry.register(new EchoTool('echo'));

    await expect(registry.dispatch('echo', { q: 1 })).resolves.toBe('echo:{"q":1}');
  });

  it('throws UnknownToolError for an unregistered name', async () => {
    const registry = new ToolRegistry();

    await expect(registry.dispatch('missing', {})).rejects.toThrow(UnknownToolError);
    await expect(registry.dispatch('missing', {})).rejects.toThrow('Unknown tool: missing');
  });

  it('wraps capability failures in ToolExecutionError', async () => {
    const registry = new ToolRegistry();
    registry.register(new FailingTool());

    const error = await registry.dispatch('failing', {}).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ToolExecutionError);
    if (error instanceof ToolExecutionError) {
      expect(error.code).toBe('TOOL_EXECUTION_FAILED');
      expect(error.toolName).toBe('failing');
      expect(error.message).toBe('Tool failing failed: disk on fire');
    }
  });

  describe('sources', () => {
    it('is empty before anything runs', () => {
      const registry = new ToolRegistry();
      registry.register(new SourcingTool('search', [{ text: 'A' }]));

      expect(registry.lastSources()).toEqual([]);
    });

    it('returns the sources of the most recent recording capability', async () => {
      const registry = new ToolRegistry();
      registry.register(new SourcingTool('first', [{ text: 'A' }]));
      registry.register(new SourcingTool('second', [{ text: 'B', url: 'https://example.com/b' }]));

      await registry.dispatch('first', {});
      await registry.dispatch('second', {});

      expect(registry.lastSources()).toEqual([{ text: 'B', url: 'https://example.com/b' }]);
    });

    it('ignores capabilities that record no sources', async () => {
      const registry = new ToolRegistry();
      registry.register(new SourcingTool('search', [{ text: 'A' }]));
      registry.register(new EchoTool('outline'));

      await registry.dispatch('search', {});
      await registry.dispatch('outline', {});

      expect(registry.lastSources()).toEqual([{ text: 'A' }]);
    });

    it('clears every capability on reset', async () => {
      const registry = new ToolRegistry();
      const search = new SourcingTool('search', [{ text: 'A' }]);
      registry.register(search);

      await registry.dispatch('search', {});
      registry.resetSources();

      expect(registry.lastSources()).toEqual([]);
      expect(search.lastSources).toEqual([]);
    });
  });
});

describe('createToolRegistry', () => {
  it('registers search then outline', () => {
    const registry = createToolRegistry(new FakeCourseStore());

    expect(registry.names()).toEqual(['search_course_content', 'get_course_outline']);
  });

  it('builds independent registries', async () => {
    const store = new FakeCourseStore();
    store.searchResult = { passages: [{ text: 'x', courseTitle: 'C', lessonNumber: 1 }] };
    const first = createToolRegistry(store);
    const second = createToolRegistry(store);

    await first.dispatch('search_course_content', { query: 'x' });

    expect(first.lastSources()).toEqual([{ text: 'C - Lesson 1' }]);
    expect(second.lastSources()).toEqual([]);
  });
});
