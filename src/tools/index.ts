/**
 * Tool set (canonical).
 */

import type { CourseStore } from '../services/courses/types.js';
import { ToolRegistry } from './registry.js';
import { CourseSearchTool } from './search.js';
import { CourseOutlineTool } from './outline.js';

/**
 * Build a registry holding fresh instances of every course tool.
 *
 * Sources live on the tool instances, so each query should get its own
 * registry rather than share one across concurrent requests.
 */
export function createToolRegistry(store: CourseStore): ToolRegistry {
  const registry = new ToolRegistry();
  registry.register(new CourseSearchTool(store));
  registry.register(new CourseOutlineTool(store));
  return registry;
}

export { ToolRegistry } from './registry.js';
export { CourseSearchTool, SEARCH_TOOL_NAME, noResultsMessage } from './search.js';
export { CourseOutlineTool, OUTLINE_TOOL_NAME, formatOutline } from './outline.js';
export type { Capability, EvidentiarySource, ToolDispatcher, ToolSchema, ParameterSchema } from './types.js';
