import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { loadMcpConfig, parseMcpConfig } from '../config.js';
import { AppError, ErrorCode } from '../../../utils/errors.js';

describe('MCP configuration', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'mcp-config-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should apply defaults to server entries', () => {
    expect(parseMcpConfig({ mcpServers: { github: { command: 'docker' } } })).toEqual({
      github: { command: 'docker', args: [], env: {} },
    });
  });

  it('should treat a missing server map as empty', () => {
    expect(parseMcpConfig({})).toEqual({});
  });

  it('should reject entries without a command', () => {
    expect(() => parseMcpConfig({ mcpServers: { github: { args: ['run'] } } })).toThrow(
      'Invalid MCP server configuration',
    );
  });

  it('should load servers from a file', async () => {
    const file = path.join(dir, 'servers.json');
    await fs.writeFile(
      file,
      JSON.stringify({ mcpServers: { db: { command: 'node', args: ['server.js'], env: { DB_URL: 'x' }, timeoutMs: 5000 } } }),
    );

    await expect(loadMcpConfig(file)).resolves.toEqual({
      db: { command: 'node', args: ['server.js'], env: { DB_URL: 'x' }, timeoutMs: 5000 },
    });
  });

  it('should continue without servers when the file is missing', async () => {
    await expect(loadMcpConfig(path.join(dir, 'absent.json'))).resolves.toEqual({});
  });

  it('should reject files that are not JSON', async () => {
    const file = path.join(dir, 'broken.json');
    await fs.writeFile(file, '{ not json');

    const error = await loadMcpConfig(file).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AppError);
    expect(error instanceof AppError && error.code).toBe(ErrorCode.VALIDATION_ERROR);
  });
});
