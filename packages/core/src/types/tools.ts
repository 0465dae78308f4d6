/**
 * @fileoverview Tool types
 *
 * Tools are capabilities the model can invoke. Each exposes a JSON schema for
 * its arguments and an execute function that resolves to text.
 */

// =============================================================================
// Tool Schema Types
// =============================================================================

export interface ToolParameterProperty {
  type: 'string' | 'number' | 'integer' | 'boolean' | 'array' | 'object';
  description?: string;
  enum?: string[];
  default?: unknown;
  items?: ToolParameterProperty;
  properties?: Record<string, ToolParameterProperty>;
}

export interface ToolParameterSchema {
  type: 'object';
  properties: Record<string, ToolParameterProperty>;
  required?: string[];
}

/**
 * What the model sees for each tool
 */
export interface ToolDefinition {
  name: string;
  description: string;
  parameters: ToolParameterSchema;
}

// =============================================================================
// Tool Port
// =============================================================================

export interface ToolExecutionResult {
  content: string;
  isError?: boolean;
}

/**
 * A capability handler. execute() should report failures through
 * `isError`; a throw is converted into an error result by the registry.
 */
export interface BurrowTool extends ToolDefinition {
  execute(args: Record<string, unknown>): Promise<ToolExecutionResult>;
}
