/**
 * @fileoverview Standardized error types.
 *
 * - AppError: Base class for application-specific errors
 * - Tool errors: raised by the tool registry and caught by the orchestrator
 * - ValidationError: request parsing failures at the HTTP boundary
 */

/**
 * Base class for application-specific errors.
 * Includes error code, recoverability flag, and optional context.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly recoverable: boolean = false,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/**
 * The model asked for a tool that is not registered.
 */
export class UnknownToolError extends AppError {
  constructor(public readonly toolName: string) {
    super(`Unknown tool: ${toolName}`, 'UNKNOWN_TOOL', true, { toolName });
    this.name = 'UnknownToolError';
  }
}

/**
 * A tool with the same name is already registered.
 */
export class DuplicateToolError extends AppError {
  constructor(public readonly toolName: string) {
    super(`Tool already registered: ${toolName}`, 'DUPLICATE_TOOL', false, { toolName });
    this.name = 'DuplicateToolError';
  }
}

/**
 * A tool handler threw while executing.
 */
export class ToolExecutionError extends AppError {
  constructor(
    public readonly toolName: string,
    public readonly originalError: unknown
  ) {
    super(
      `Tool ${toolName} failed: ${errorMessage(originalError)}`,
      'TOOL_EXECUTION_FAILED',
      true,
      { toolName }
    );
    this.name = 'ToolExecutionError';
  }
}

/**
 * Request input failed validation.
 */
export class ValidationError extends AppError {
  constructor(
    message: string,
    public readonly status: 400 | 422 = 400
  ) {
    super(message, 'VALIDATION_FAILED', true);
    this.name = 'ValidationError';
  }
}

/**
 * Message of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
