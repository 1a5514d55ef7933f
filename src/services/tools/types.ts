// Capability system types and interfaces
// A capability is a named external operation invoked with an argument mapping

export type ToolParameterType = 'string' | 'number' | 'boolean' | 'array' | 'object';

export interface ToolParameter {
  name: string;
  type: ToolParameterType;
  description: string;
  required: boolean;
  enum?: string[]; // For enum types
  default?: unknown;
}

/**
 * Structured outcome of one invocation. Failures are reported in-band as
 * `{ error: reason }`, never thrown past the invoker.
 */
export type CapabilityResult = Record<string, unknown>;

export type ToolSource = 'builtin' | 'mcp';

export interface ToolDefinition {
  name: string;
  description: string;
  parameters: ToolParameter[];
  source: ToolSource;
  invoke: (args: Record<string, unknown>) => Promise<CapabilityResult>;
}

/**
 * A source of capabilities that holds external resources for a session.
 */
export interface CapabilityProvider {
  getToolDefinitions(): ToolDefinition[];
  close(): Promise<void>;
}
