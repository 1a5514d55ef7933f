import { describe, it, expect, vi } from 'vitest';
import { TaskSupervisor, START_MESSAGE, type SessionTask } from '../task-supervisor.js';
import { toolLoopFallbackAnswer } from '../../orchestrator/prompts.js';
import type { SessionFactory } from '../chat-session.js';
import {
  TARGET,
  createFakeCapabilities,
  createFakeNotifier,
  createFakeProvider,
  createTestSession,
  fakeTool,
  toolRequest,
} from './fakes.js';

const task: SessionTask = { ...TARGET, message: 'What does the demo repository contain?' };

function terminalUpdates(notifier: ReturnType<typeof createFakeNotifier>) {
  return notifier.sent.filter(progress => progress.isComplete);
}

describe('TaskSupervisor', () => {
  it('should send the final answer as the only terminal update', async () => {
    const closeOrder: string[] = [];
    const notifier = createFakeNotifier(closeOrder);
    const capabilities = createFakeCapabilities([fakeTool('search', { items: ['README.md'] })], closeOrder);
    const provider = createFakeProvider([toolRequest('search', { q: 'demo' }), 'LISTO', 'The repository has a README.']);
    const supervisor = new TaskSupervisor(() =>
      createTestSession({ provider, notifier, connectCapabilities: async () => capabilities }),
    );

    await expect(supervisor.run(task)).resolves.toBe('completed');

    expect(notifier.sent[0]).toEqual({ ...TARGET, message: START_MESSAGE, status: 'processing', isComplete: false });
    expect(notifier.sent).toHaveLength(7);
    expect(notifier.sent.slice(0, -1).every(progress => progress.status === 'processing')).toBe(true);
    expect(terminalUpdates(notifier)).toEqual([
      { ...TARGET, message: 'The repository has a README.', status: 'completed', isComplete: true },
    ]);
    expect(closeOrder).toEqual(['capabilities', 'notifier']);
  });

  it('should report a fallback answer when every iteration fails', async () => {
    const notifier = createFakeNotifier();
    const capabilities = createFakeCapabilities([fakeTool('get_file_contents', { error: 'Not Found' })]);
    const provider = createFakeProvider([toolRequest('get_file_contents', { path: 'missing.md' })], 'ERROR');
    const supervisor = new TaskSupervisor(() =>
      createTestSession({ provider, notifier, connectCapabilities: async () => capabilities }),
    );

    await expect(supervisor.run(task)).resolves.toBe('completed');

    expect(terminalUpdates(notifier)).toEqual([
      { ...TARGET, message: toolLoopFallbackAnswer(0, 10), status: 'completed', isComplete: true },
    ]);
    expect(notifier.sent.at(-1)?.isComplete).toBe(true);
    expect(capabilities.close).toHaveBeenCalledTimes(1);
  });

  it('should send an error update when capabilities cannot be connected', async () => {
    const notifier = createFakeNotifier();
    const provider = createFakeProvider(['unused']);
    const supervisor = new TaskSupervisor(() =>
      createTestSession({
        provider,
        notifier,
        connectCapabilities: async () => {
          throw new Error('MCP server exited');
        },
      }),
    );

    await expect(supervisor.run(task)).resolves.toBe('error');

    expect(notifier.sent.map(progress => progress.status)).toEqual(['processing', 'error']);
    expect(terminalUpdates(notifier)).toEqual([
      {
        ...TARGET,
        message: 'Error processing the message: MCP server exited',
        status: 'error',
        isComplete: true,
      },
    ]);
    expect(provider.sendChat).not.toHaveBeenCalled();
    expect(notifier.close).toHaveBeenCalledTimes(1);
  });

  it('should send an error update when the model never answers', async () => {
    const notifier = createFakeNotifier();
    const capabilities = createFakeCapabilities([]);
    const provider = createFakeProvider(['   ']);
    const supervisor = new TaskSupervisor(() =>
      createTestSession({ provider, notifier, connectCapabilities: async () => capabilities }),
    );

    await expect(supervisor.run(task)).resolves.toBe('error');

    expect(provider.sendChat).toHaveBeenCalledTimes(2);
    expect(terminalUpdates(notifier)).toEqual([
      {
        ...TARGET,
        message: 'Error processing the message: The language model did not respond',
        status: 'error',
        isComplete: true,
      },
    ]);
    expect(capabilities.close).toHaveBeenCalledTimes(1);
    expect(notifier.close).toHaveBeenCalledTimes(1);
  });

  it('should complete even when webhook delivery fails', async () => {
    const notifier = createFakeNotifier();
    notifier.send.mockResolvedValue(false);
    const provider = createFakeProvider(['Plain answer']);
    const supervisor = new TaskSupervisor(() => createTestSession({ provider, notifier }));

    await expect(supervisor.run(task)).resolves.toBe('completed');

    expect(notifier.send).toHaveBeenCalledTimes(2);
    expect(notifier.send).toHaveBeenLastCalledWith({
      ...TARGET,
      message: 'Plain answer',
      status: 'completed',
      isComplete: true,
    });
  });

  it('should report the error on a standalone channel when the session cannot be created', async () => {
    const fallback = createFakeNotifier();
    const factory: SessionFactory = () => {
      throw new Error('provider not configured');
    };
    const supervisor = new TaskSupervisor(factory, { createNotifier: () => fallback });

    await expect(supervisor.launch(task)).resolves.toBe('error');
    await supervisor.drain();

    expect(supervisor.activeCount).toBe(0);
    expect(fallback.sent).toEqual([
      {
        ...TARGET,
        message: 'Error processing the message: provider not configured',
        status: 'error',
        isComplete: true,
      },
    ]);
    expect(fallback.close).toHaveBeenCalledTimes(1);
  });

  it('should not open a standalone channel when the session exists', async () => {
    const createNotifier = vi.fn(() => createFakeNotifier());
    const notifier = createFakeNotifier();
    const supervisor = new TaskSupervisor(
      () =>
        createTestSession({
          provider: createFakeProvider(['unused']),
          notifier,
          connectCapabilities: async () => {
            throw new Error('MCP server exited');
          },
        }),
      { createNotifier },
    );

    await expect(supervisor.run(task)).resolves.toBe('error');

    expect(createNotifier).not.toHaveBeenCalled();
    expect(terminalUpdates(notifier)).toHaveLength(1);
  });

  it('should track launched runs until they finish', async () => {
    let release: () => void = () => {};
    const gate = new Promise<void>(resolve => {
      release = resolve;
    });
    const notifier = createFakeNotifier();
    const provider = createFakeProvider(['Answer after the gate']);
    const supervisor = new TaskSupervisor(() =>
      createTestSession({
        provider,
        notifier,
        connectCapabilities: async () => {
          await gate;
          return createFakeCapabilities([]);
        },
      }),
    );

    const first = supervisor.launch(task);
    const second = supervisor.launch({ ...task, sessionId: 'session-2' });
    expect(supervisor.activeCount).toBe(2);

    release();
    await supervisor.drain();

    await expect(first).resolves.toBe('completed');
    await expect(second).resolves.toBe('completed');
    expect(supervisor.activeCount).toBe(0);
    expect(terminalUpdates(notifier)).toHaveLength(2);
  });

  it('should pass history and role to the model', async () => {
    const provider = createFakeProvider(['Answer for a reviewer']);
    const notifier = createFakeNotifier();
    const supervisor = new TaskSupervisor(() => createTestSession({ provider, notifier }));

    await supervisor.run({ ...task, userRole: 'code reviewer', previousMessages: ['user: hi', 'assistant: hello'] });

    const messages = provider.sendChat.mock.calls[0]?.[0] ?? [];
    expect(messages.map(message => message.role)).toEqual(['system', 'system', 'user']);
    expect(messages[0]?.content).toContain('The person asking is a code reviewer');
    expect(messages[1]?.content).toBe('Previous conversation:\nuser: hi\nassistant: hello');
    expect(messages[2]?.content).toBe(task.message);
  });
});

describe('TaskSupervisor drain', () => {
  it('should resolve immediately with nothing in flight', async () => {
    const supervisor = new TaskSupervisor(vi.fn<SessionFactory>());
    await expect(supervisor.drain()).resolves.toBeUndefined();
  });
});
