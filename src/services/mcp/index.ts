// MCP Module - Main exports

import { McpCapabilityProvider } from './client.js';
import { loadMcpConfig } from './config.js';

export { McpCapabilityProvider, decodeToolResult, schemaToParameters } from './client.js';
export type { McpCapabilityProviderOptions } from './client.js';
export { loadMcpConfig, parseMcpConfig, McpConfigFileSchema, McpServerConfigSchema } from './config.js';
export type { McpServerConfig } from './config.js';

/**
 * Reads the server map and connects to every configured server.
 */
export async function connectMcpServers(configPath: string): Promise<McpCapabilityProvider> {
  const configs = await loadMcpConfig(configPath);
  const provider = new McpCapabilityProvider();
  await provider.connectAll(configs);
  return provider;
}
