// MCP server configuration
// Reads the mcpServers map from a JSON file, same shape as desktop MCP clients use

import * as fs from 'fs/promises';
import { z } from 'zod';
import { AppError, errorMessage } from '../../utils/errors.js';
import { componentLogger } from '../../utils/logger.js';

const log = componentLogger('mcp-config');

export const McpServerConfigSchema = z.object({
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  env: z.record(z.string()).default({}),
  cwd: z.string().optional(),
  timeoutMs: z.number().int().positive().optional(),
});

export const McpConfigFileSchema = z.object({
  mcpServers: z.record(McpServerConfigSchema).default({}),
});

export type McpServerConfig = z.infer<typeof McpServerConfigSchema>;

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export function parseMcpConfig(raw: unknown): Record<string, McpServerConfig> {
  const result = McpConfigFileSchema.safeParse(raw);
  if (!result.success) {
    throw AppError.validationError('Invalid MCP server configuration', result.error.flatten());
  }
  return result.data.mcpServers;
}

/**
 * Loads the MCP server map. A missing file means no MCP servers; a file
 * that is not valid JSON or does not match the schema is an error.
 */
export async function loadMcpConfig(configPath: string): Promise<Record<string, McpServerConfig>> {
  let text: string;
  try {
    text = await fs.readFile(configPath, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) {
      log.warn({ configPath }, 'MCP configuration not found, continuing without MCP servers');
      return {};
    }
    throw error;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw AppError.validationError(`MCP configuration ${configPath} is not valid JSON: ${errorMessage(error)}`);
  }

  return parseMcpConfig(raw);
}
