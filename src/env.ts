// Environment configuration for the tool-loop API
// Load model credentials, loop limits and MCP settings from environment variables

const strEnv = (value: string | undefined, fallback = '') => (value ?? fallback).trim();

function parsePort(value: string | undefined, defaultPort: number): number {
  if (!value) return defaultPort;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1 || parsed > 65535) {
    console.error(`Invalid PORT "${value}", using default ${defaultPort}`);
    return defaultPort;
  }
  return parsed;
}

export interface IntRange {
  min?: number;
  max?: number;
}

export function parseBoundedInt(
  value: string | undefined,
  defaultValue: number,
  name: string,
  { min = 0, max = Number.MAX_SAFE_INTEGER }: IntRange = {},
): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < min || parsed > max) {
    console.error(`Invalid ${name} "${value}" (expected ${min}-${max}), using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

// The orchestrator never runs more than 10 iterations
const ITERATION_RANGE: IntRange = { min: 1, max: 10 };
const TIMEOUT_RANGE: IntRange = { min: 1 };

const NODE_ENV = process.env.NODE_ENV || 'development';

export const env = {
  // Server
  PORT: parsePort(process.env.PORT, 8000),
  HOST: process.env.HOST || '127.0.0.1',
  NODE_ENV,

  // DeepSeek
  DEEPSEEK_API_KEY: strEnv(process.env.DEEPSEEK_API_KEY || process.env.DEEP_SEEK_API_KEY),
  DEEPSEEK_BASE_URL: strEnv(process.env.DEEPSEEK_BASE_URL, 'https://api.deepseek.com'),
  DEEPSEEK_MODEL: strEnv(process.env.DEEPSEEK_MODEL, 'deepseek-chat'),
  CLASSIFIER_MODEL: strEnv(process.env.CLASSIFIER_MODEL, process.env.DEEPSEEK_MODEL || 'deepseek-chat'),
  MODEL_TIMEOUT_MS: parseBoundedInt(process.env.MODEL_TIMEOUT_MS, 60000, 'MODEL_TIMEOUT_MS', TIMEOUT_RANGE),

  // Capabilities
  MCP_CONFIG_PATH: strEnv(process.env.MCP_CONFIG_PATH, 'config/mcp-servers.json'),
  ALLOWED_TOOLS: (process.env.ALLOWED_TOOLS || '')
    .split(',')
    .map(s => s.trim())
    .filter(Boolean),
  BUILTIN_TOOLS_ENABLED: process.env.BUILTIN_TOOLS_ENABLED !== 'false', // Default true
  TOOL_TIMEOUT_MS: parseBoundedInt(process.env.TOOL_TIMEOUT_MS, 30000, 'TOOL_TIMEOUT_MS', TIMEOUT_RANGE),

  // Orchestration loop
  MAX_ITERATIONS: parseBoundedInt(process.env.MAX_ITERATIONS, 10, 'MAX_ITERATIONS', ITERATION_RANGE),
  ITERATION_DELAY_MS: parseBoundedInt(process.env.ITERATION_DELAY_MS, 2000, 'ITERATION_DELAY_MS'),

  // Webhook notifications
  NOTIFIER_TIMEOUT_MS: parseBoundedInt(process.env.NOTIFIER_TIMEOUT_MS, 10000, 'NOTIFIER_TIMEOUT_MS', TIMEOUT_RANGE),

  // Logging
  LOG_LEVEL: process.env.LOG_LEVEL || (NODE_ENV === 'test' ? 'silent' : 'info'),
};

export function isProviderConfigured(provider: string): boolean {
  switch (provider) {
    case 'deepseek':
      return !!env.DEEPSEEK_API_KEY;
    default:
      return false;
  }
}

export function listConfiguredProviders(): string[] {
  const providers = ['deepseek'];
  return providers.filter(isProviderConfigured);
}

// Log configuration on startup (redact secrets)
export function logConfiguration() {
  const configured = listConfiguredProviders();
  console.log('Tool-loop API Configuration:');
  console.log(`  Environment: ${env.NODE_ENV}`);
  console.log(`  Server: ${env.HOST}:${env.PORT}`);
  console.log(`  Configured providers: ${configured.join(', ') || 'none'}`);
  console.log(`  Model: ${env.DEEPSEEK_MODEL} (classifier: ${env.CLASSIFIER_MODEL})`);
  console.log(`  MCP config: ${env.MCP_CONFIG_PATH}`);
  console.log(`  Allowed tools: ${env.ALLOWED_TOOLS.join(', ') || 'all'}`);
  console.log(`  Built-in tools enabled: ${env.BUILTIN_TOOLS_ENABLED}`);
  console.log(`  Max iterations: ${env.MAX_ITERATIONS}`);
  console.log(`  Iteration delay ms: ${env.ITERATION_DELAY_MS}`);
  console.log(`  Notifier timeout ms: ${env.NOTIFIER_TIMEOUT_MS}`);
}
