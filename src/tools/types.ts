/**
 * Tool type definitions (canonical location).
 */

/**
 * Declared shape of one tool parameter.
 */
export type ParameterSchema = {
  type: 'string' | 'integer' | 'number' | 'boolean';
  description: string;
};

/**
 * Machine-readable tool declaration, in the shape the Anthropic Messages API
 * expects for `tools`.
 */
export type ToolSchema = {
  name: string;
  description: string;
  input_schema: {
    type: 'object';
    properties: Record<string, ParameterSchema>;
    required: string[];
  };
};

/**
 * A citation for content the model was shown.
 */
export interface EvidentiarySource {
  /** Label such as "Python Basics - Lesson 1" */
  text: string;
  url?: string;
}

/**
 * A tool the model can call by name.
 *
 * Capabilities that return course content record where it came from in
 * `lastSources`; the list is replaced on every execution.
 */
export interface Capability {
  readonly schema: ToolSchema;
  execute(input: Record<string, unknown>): Promise<string>;
  lastSources?: EvidentiarySource[];
}

/**
 * What the orchestrator needs from the registry: run a tool by name.
 * Throws on unknown tools and on tool failures.
 */
export interface ToolDispatcher {
  dispatch(name: string, input: Record<string, unknown>): Promise<string>;
}
