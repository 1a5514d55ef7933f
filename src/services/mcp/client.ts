// MCP Capability Provider
// Connects to MCP servers, discovers their tools and exposes them as capabilities

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { errorMessage } from '../../utils/errors.js';
import { isRecord } from '../../utils/json.js';
import { componentLogger } from '../../utils/logger.js';
import type {
  CapabilityProvider,
  CapabilityResult,
  ToolDefinition,
  ToolParameter,
  ToolParameterType,
} from '../tools/types.js';
import type { McpServerConfig } from './config.js';

const log = componentLogger('mcp-client');

const DEFAULT_CALL_TIMEOUT_MS = 60_000;
const PARAMETER_TYPES: readonly ToolParameterType[] = ['string', 'number', 'boolean', 'array', 'object'];

interface ConnectedServer {
  name: string;
  client: Client;
  tools: ToolDefinition[];
  timeoutMs: number;
}

function toParameterType(raw: unknown): ToolParameterType {
  if (raw === 'integer') return 'number';
  const match = PARAMETER_TYPES.find(t => t === raw);
  return match ?? 'object';
}

/**
 * Converts a JSON-schema `inputSchema` into the registry's parameter list.
 */
export function schemaToParameters(inputSchema: unknown): ToolParameter[] {
  if (!isRecord(inputSchema) || !isRecord(inputSchema.properties)) {
    return [];
  }
  const required = Array.isArray(inputSchema.required)
    ? inputSchema.required.filter((r): r is string => typeof r === 'string')
    : [];

  return Object.entries(inputSchema.properties).map(([name, schema]) => {
    const prop = isRecord(schema) ? schema : {};
    const param: ToolParameter = {
      name,
      type: toParameterType(prop.type),
      description: typeof prop.description === 'string' ? prop.description : '',
      required: required.includes(name),
    };
    if (Array.isArray(prop.enum)) {
      param.enum = prop.enum.filter((v): v is string => typeof v === 'string');
    }
    if (prop.default !== undefined) {
      param.default = prop.default;
    }
    return param;
  });
}

function firstTextContent(result: unknown): string | undefined {
  if (!isRecord(result) || !Array.isArray(result.content)) return undefined;
  const first: unknown = result.content[0];
  if (isRecord(first) && first.type === 'text' && typeof first.text === 'string') {
    return first.text;
  }
  return undefined;
}

/**
 * Decodes a tools/call result into a capability result. The first text block
 * is parsed as JSON when possible; error-flagged results always surface an
 * `error` key.
 */
export function decodeToolResult(result: unknown): CapabilityResult {
  const text = firstTextContent(result);
  if (text === undefined) {
    return { error: 'No valid response received' };
  }

  let decoded: CapabilityResult;
  try {
    const parsed: unknown = JSON.parse(text);
    decoded = isRecord(parsed) ? parsed : { result: parsed };
  } catch {
    decoded = { text };
  }

  const flaggedError = isRecord(result) && result.isError === true;
  if (flaggedError && !('error' in decoded)) {
    return { error: text };
  }
  return decoded;
}

export interface McpCapabilityProviderOptions {
  clientName?: string;
  clientVersion?: string;
}

export class McpCapabilityProvider implements CapabilityProvider {
  private servers = new Map<string, ConnectedServer>();
  private closed = false;

  constructor(private options: McpCapabilityProviderOptions = {}) {}

  /**
   * Spawns every configured server over stdio. A server that fails to start
   * is logged and skipped; the session continues with the others.
   */
  async connectAll(configs: Record<string, McpServerConfig>): Promise<void> {
    const entries = Object.entries(configs);
    if (entries.length === 0) return;

    log.debug({ count: entries.length }, 'Connecting to MCP servers');

    await Promise.all(
      entries.map(async ([name, cfg]) => {
        try {
          const transport = new StdioClientTransport({
            command: cfg.command,
            args: cfg.args,
            env: { ...inheritedEnv(), ...cfg.env },
            cwd: cfg.cwd,
            stderr: 'pipe',
          });
          await this.connect(name, transport, cfg.timeoutMs);
        } catch (error) {
          log.warn({ server: name, err: errorMessage(error) }, 'MCP server failed to connect');
        }
      }),
    );
  }

  async connect(name: string, transport: Transport, timeoutMs: number = DEFAULT_CALL_TIMEOUT_MS): Promise<void> {
    if (this.closed) {
      throw new Error('MCP capability provider is closed');
    }

    const client = new Client(
      { name: this.options.clientName ?? 'toolloop-api', version: this.options.clientVersion ?? '1.0.0' },
      { capabilities: {} },
    );

    await client.connect(transport);

    let toolsResult: Awaited<ReturnType<Client['listTools']>>;
    try {
      toolsResult = await client.listTools();
    } catch (error) {
      // Not yet tracked in `servers`, so close() would never reach it
      await client.close().catch((closeError: unknown) => {
        log.debug({ server: name, err: errorMessage(closeError) }, 'MCP server close error');
      });
      throw error;
    }
    const tools: ToolDefinition[] = toolsResult.tools.map(tool => ({
      name: tool.name,
      description: tool.description ?? '',
      parameters: schemaToParameters(tool.inputSchema),
      source: 'mcp',
      invoke: (args: Record<string, unknown>) => this.callTool(name, tool.name, args),
    }));

    this.servers.set(name, { name, client, tools, timeoutMs });
    log.info({ server: name, tools: tools.map(t => t.name) }, 'Connected to MCP server');
  }

  getToolDefinitions(): ToolDefinition[] {
    return Array.from(this.servers.values()).flatMap(server => server.tools);
  }

  get connectedServers(): string[] {
    return Array.from(this.servers.keys());
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async callTool(serverName: string, toolName: string, args: Record<string, unknown>): Promise<CapabilityResult> {
    const server = this.servers.get(serverName);
    if (!server || this.closed) {
      return { error: 'No active MCP connection' };
    }

    const result = await server.client.callTool({ name: toolName, arguments: args }, undefined, {
      timeout: server.timeoutMs,
    });
    return decodeToolResult(result);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    for (const server of this.servers.values()) {
      try {
        await server.client.close();
      } catch (error) {
        log.debug({ server: server.name, err: errorMessage(error) }, 'MCP server close error');
      }
    }
    this.servers.clear();
    log.debug('MCP connections closed');
  }
}

function inheritedEnv(): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}
