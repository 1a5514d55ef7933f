import { describe, it, expect, vi } from 'vitest';
import { ResultClassifier, heuristicIsError, replyIndicatesError } from '../classifier.js';
import type { ProviderMessage } from '../../../providers/types.js';
import type { CompletionRequest } from '../types.js';

const request = { name: 'get_file_contents', arguments: { owner: 'octo', repo: 'demo' } };

function createFakeClient(reply: string | null | Error) {
  const complete = vi.fn(async (_messages: ProviderMessage[], _request: CompletionRequest): Promise<string | null> => {
    if (reply instanceof Error) throw reply;
    return reply;
  });
  return { complete };
}

function promptOf(client: ReturnType<typeof createFakeClient>): string {
  return client.complete.mock.calls[0]?.[0][0]?.content ?? '';
}

describe('heuristicIsError', () => {
  it('should flag results containing error indicators', () => {
    expect(heuristicIsError({ error: 'missing required parameter: path' })).toBe(true);
    expect(heuristicIsError({ message: 'Resource Not Found' })).toBe(true);
    expect(heuristicIsError({ status: 'Access DENIED' })).toBe(true);
  });

  it('should pass clean results', () => {
    expect(heuristicIsError({ items: ['alpha', 'beta', 'gamma'], total_count: 3 })).toBe(false);
  });

  it('should give the same answer on repeated calls', () => {
    const result = { detail: 'unable to reach host' };
    expect(heuristicIsError(result)).toBe(heuristicIsError(result));
    expect(heuristicIsError({ ok: 1 })).toBe(heuristicIsError({ ok: 1 }));
  });
});

describe('replyIndicatesError', () => {
  it('should look for the error token in any case', () => {
    expect(replyIndicatesError('ERROR')).toBe(true);
    expect(replyIndicatesError(' error.')).toBe(true);
    expect(replyIndicatesError('SUCCESS')).toBe(false);
  });

  it('should treat a reply with neither token as success', () => {
    expect(replyIndicatesError('I am not sure')).toBe(false);
  });
});

describe('ResultClassifier', () => {
  it('should ask the model with a constrained call', async () => {
    const client = createFakeClient('SUCCESS');
    const classifier = new ResultClassifier(client);

    await expect(classifier.classify(request, { content: 'hello' })).resolves.toBe(false);

    expect(client.complete).toHaveBeenCalledTimes(1);
    expect(client.complete).toHaveBeenCalledWith([expect.objectContaining({ role: 'user' })], {
      maxTokens: 10,
      temperature: 0.1,
    });
    expect(promptOf(client)).toContain('TOOL USED: get_file_contents');
    expect(promptOf(client)).toContain('"owner": "octo"');
  });

  it('should follow the model verdict over the heuristic', async () => {
    const classifier = new ResultClassifier(createFakeClient('ERROR'));
    await expect(classifier.classify(request, { items: [1, 2, 3] })).resolves.toBe(true);

    const lenient = new ResultClassifier(createFakeClient('SUCCESS'));
    await expect(lenient.classify(request, { error: 'bad path' })).resolves.toBe(false);
  });

  it('should treat an ambiguous verdict as success', async () => {
    const classifier = new ResultClassifier(createFakeClient('Looks fine to me'));
    await expect(classifier.classify(request, { error: 'bad path' })).resolves.toBe(false);
  });

  it('should fall back to the heuristic when the model returns nothing', async () => {
    const classifier = new ResultClassifier(createFakeClient(null));
    await expect(classifier.classify(request, { error: 'bad path' })).resolves.toBe(true);
    await expect(classifier.classify(request, { items: ['a'] })).resolves.toBe(false);
  });

  it('should fall back to the heuristic when the call throws', async () => {
    const classifier = new ResultClassifier(createFakeClient(new Error('socket hang up')));
    await expect(classifier.classifyAs(request, { message: 'Forbidden' })).resolves.toBe('error');
    await expect(classifier.classifyAs(request, { items: ['a'] })).resolves.toBe('success');
  });

  it('should truncate long results in the prompt', async () => {
    const client = createFakeClient('SUCCESS');
    const classifier = new ResultClassifier(client);

    await classifier.classify(request, { blob: 'z'.repeat(5000) });

    const content = promptOf(client);
    expect(content).toContain('z'.repeat(900));
    expect(content).not.toContain('z'.repeat(1000));
  });
});
