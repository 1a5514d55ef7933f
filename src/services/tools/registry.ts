// Capability Registry
// Explicit map from capability name to its invocation function

import { AppError } from '../../utils/errors.js';
import { componentLogger } from '../../utils/logger.js';
import type { ToolDefinition } from './types.js';

const log = componentLogger('tool-registry');

export class ToolRegistry {
  private tools: Map<string, ToolDefinition> = new Map();

  /**
   * Builds a registry from a discovered catalog. Duplicate names are rejected
   * and every allow-listed name must exist in the catalog; when an allow-list
   * is given only those capabilities are registered.
   */
  static fromCatalog(catalog: ToolDefinition[], allowed: string[] = []): ToolRegistry {
    const byName = new Map<string, ToolDefinition>();
    for (const tool of catalog) {
      if (byName.has(tool.name)) {
        throw AppError.toolCatalog(`Capability "${tool.name}" is provided more than once`, {
          sources: [byName.get(tool.name)?.source, tool.source],
        });
      }
      byName.set(tool.name, tool);
    }

    const unknown = allowed.filter(name => !byName.has(name));
    if (unknown.length > 0) {
      throw AppError.toolCatalog(`Allowed capabilities not found in catalog: ${unknown.join(', ')}`, {
        unknown,
        available: Array.from(byName.keys()),
      });
    }

    const registry = new ToolRegistry();
    const allowedSet = new Set(allowed);
    for (const tool of byName.values()) {
      if (allowedSet.size === 0 || allowedSet.has(tool.name)) {
        registry.register(tool);
      }
    }

    const restricted = byName.size - registry.size;
    if (restricted > 0) {
      log.info({ allowed: registry.size, restricted }, 'Capability catalog filtered by allow-list');
    }

    return registry;
  }

  register(tool: ToolDefinition): void {
    if (this.tools.has(tool.name)) {
      log.warn({ tool: tool.name }, 'Tool already registered, overwriting');
    }
    this.tools.set(tool.name, tool);
  }

  get(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  getAll(): ToolDefinition[] {
    return Array.from(this.tools.values());
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  names(): string[] {
    return Array.from(this.tools.keys());
  }

  get size(): number {
    return this.tools.size;
  }

  /**
   * Renders the capability preamble shown to the model. Required
   * parameters carry a trailing `*`.
   */
  describe(): string {
    if (this.tools.size === 0) {
      return 'No tools are available for this session.';
    }

    const lines: string[] = ['Available tools:', ''];
    for (const tool of this.tools.values()) {
      const required = tool.parameters.filter(p => p.required).map(p => `${p.name}*`);
      const optional = tool.parameters.filter(p => !p.required).map(p => p.name);
      const params = [...required, ...optional];
      lines.push(`- ${tool.name}(${params.length > 0 ? params.join(', ') : 'no parameters'})`);
      if (tool.description) {
        lines.push(`  └─ ${tool.description}`);
      }
    }
    lines.push('');
    lines.push('You can use any of these tools as needed.');
    lines.push('Parameters marked with * are required.');

    return lines.join('\n');
  }
}
