import { describe, it, expect, vi } from 'vitest';
import { AppError, ErrorCode } from '../../../utils/errors.js';
import { calculatorTool } from '../../tools/calculator-tool.js';
import {
  TARGET,
  createFakeCapabilities,
  createFakeNotifier,
  createFakeProvider,
  createTestSession,
  fakeTool,
  toolRequest,
} from './fakes.js';

describe('ChatSessionService', () => {
  it('should connect capabilities once however often it is initialized', async () => {
    const capabilities = createFakeCapabilities([fakeTool('search', { items: [] })]);
    const connectCapabilities = vi.fn(async () => capabilities);
    const session = createTestSession({
      provider: createFakeProvider(['unused']),
      connectCapabilities,
      builtinTools: [calculatorTool],
    });

    await Promise.all([session.initialize(), session.initialize()]);
    await session.initialize();

    expect(connectCapabilities).toHaveBeenCalledTimes(1);
    expect(session.tools).toEqual(['calculator', 'search']);
  });

  it('should resolve a lazy provider on initialize', async () => {
    const provider = createFakeProvider(['Hello']);
    const resolveProvider = vi.fn(() => provider);
    const session = createTestSession({ provider: resolveProvider });

    expect(resolveProvider).not.toHaveBeenCalled();
    const result = await session.ask('Say hello');

    expect(resolveProvider).toHaveBeenCalledTimes(1);
    expect(result).toEqual({
      response: 'Hello',
      iterations: 1,
      toolCalls: 0,
      succeeded: 0,
      failed: 0,
      termination: 'direct',
    });
  });

  it('should reject allow-lists naming unknown tools', async () => {
    const session = createTestSession({
      provider: createFakeProvider(['unused']),
      connectCapabilities: async () => createFakeCapabilities([fakeTool('search', {})]),
      allowedTools: ['search', 'delete_repository'],
    });

    const failure = await session.initialize().catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(AppError);
    if (failure instanceof AppError) {
      expect(failure.code).toBe(ErrorCode.TOOL_CATALOG_ERROR);
    }
  });

  it('should run tools through the session registry', async () => {
    const provider = createFakeProvider([toolRequest('calculator', { expression: '6 * 7' }), 'LISTO', 'It is 42.']);
    const session = createTestSession({ provider, builtinTools: [calculatorTool] });

    const result = await session.ask('What is six times seven?');

    expect(result).toMatchObject({ response: 'It is 42.', toolCalls: 1, succeeded: 1, failed: 0, termination: 'sentinel' });
  });

  it('should not notify without a webhook target', async () => {
    const notifier = createFakeNotifier();
    const session = createTestSession({ provider: createFakeProvider(['x']), notifier, target: undefined });

    await expect(session.notify('processing', 'working', false)).resolves.toBe(false);
    expect(notifier.send).not.toHaveBeenCalled();
  });

  it('should notify the session target', async () => {
    const notifier = createFakeNotifier();
    const session = createTestSession({ provider: createFakeProvider(['x']), notifier });

    await expect(session.notify('completed', 'done', true)).resolves.toBe(true);
    expect(notifier.sent).toEqual([{ ...TARGET, message: 'done', status: 'completed', isComplete: true }]);
  });

  it('should close capabilities before the notifier, once', async () => {
    const closeOrder: string[] = [];
    const capabilities = createFakeCapabilities([], closeOrder);
    const notifier = createFakeNotifier(closeOrder);
    const session = createTestSession({
      provider: createFakeProvider(['x']),
      notifier,
      connectCapabilities: async () => capabilities,
    });
    await session.initialize();

    await session.close();
    await session.close();

    expect(session.isClosed).toBe(true);
    expect(closeOrder).toEqual(['capabilities', 'notifier']);
  });

  it('should still close the notifier when capabilities fail to close', async () => {
    const capabilities = createFakeCapabilities([]);
    capabilities.close.mockRejectedValue(new Error('transport already gone'));
    const notifier = createFakeNotifier();
    const session = createTestSession({
      provider: createFakeProvider(['x']),
      notifier,
      connectCapabilities: async () => capabilities,
    });
    await session.initialize();

    await expect(session.close()).resolves.toBeUndefined();
    expect(notifier.close).toHaveBeenCalledTimes(1);
  });

  it('should refuse to initialize after close', async () => {
    const session = createTestSession({ provider: createFakeProvider(['x']) });
    await session.close();

    await expect(session.initialize()).rejects.toThrow('Chat session is closed');
  });
});
