// Capability System
// Built-in capabilities plus the registry that sessions assemble from them and MCP

import { env } from '../../env.js';
import { calculatorTool } from './calculator-tool.js';
import type { ToolDefinition } from './types.js';

export { ToolRegistry } from './registry.js';
export { calculatorTool } from './calculator-tool.js';
export type {
  CapabilityProvider,
  CapabilityResult,
  ToolDefinition,
  ToolParameter,
  ToolParameterType,
  ToolSource,
} from './types.js';

export function getBuiltinTools(enabled: boolean = env.BUILTIN_TOOLS_ENABLED): ToolDefinition[] {
  return enabled ? [calculatorTool] : [];
}
