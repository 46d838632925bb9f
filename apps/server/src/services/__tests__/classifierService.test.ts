import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ExternalServiceError } from '@support-desk/shared';

const { createMock, constructorMock } = vi.hoisted(() => ({
  createMock: vi.fn(),
  constructorMock: vi.fn(),
}));

vi.mock('@anthropic-ai/sdk', () => ({
  default: class {
    messages = { create: createMock };

    constructor(options: unknown) {
      constructorMock(options);
    }
  },
}));

import { createClassifierService, parseJudgement } from '../classifierService.js';

const textReply = (text: string) => ({ content: [{ type: 'text', text }] });

describe('classifierService', () => {
  const configured = () =>
    createClassifierService({ apiKey: 'test-key', model: 'test-model', timeoutMs: 5000 });

  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    createMock.mockReset();
    constructorMock.mockReset();
  });

  it('returns null suggestions without a client when no key is configured', async () => {
    const classifier = createClassifierService({ model: 'test-model', timeoutMs: 5000 });

    await expect(classifier.classify('I was charged twice')).resolves.toEqual({
      suggested_category: null,
      suggested_priority: null,
    });
    expect(classifier.isConfigured()).toBe(false);
    expect(constructorMock).not.toHaveBeenCalled();
    expect(createMock).not.toHaveBeenCalled();
  });

  it('skips the call for a blank description', async () => {
    const result = await configured().classify('   ');

    expect(result).toEqual({ suggested_category: null, suggested_priority: null });
    expect(createMock).not.toHaveBeenCalled();
  });

  it('sends the trimmed description with a timeout and no retries', async () => {
    createMock.mockResolvedValue(textReply('{"category": "billing", "priority": "high"}'));

    const result = await configured().classify('  I was charged twice for my subscription  ');

    expect(result).toEqual({ suggested_category: 'billing', suggested_priority: 'high' });
    expect(constructorMock).toHaveBeenCalledWith({ apiKey: 'test-key', timeout: 5000, maxRetries: 0 });
    expect(createMock).toHaveBeenCalledWith(
      expect.objectContaining({
        model: 'test-model',
        temperature: 0,
        messages: [
          { role: 'user', content: 'Ticket description:\nI was charged twice for my subscription' },
        ],
      })
    );
  });

  it('reuses one client across calls', async () => {
    createMock.mockResolvedValue(textReply('{"category": "general", "priority": "low"}'));
    const classifier = configured();

    await classifier.classify('first');
    await classifier.classify('second');

    expect(constructorMock).toHaveBeenCalledTimes(1);
    expect(createMock).toHaveBeenCalledTimes(2);
  });

  it.each([
    { label: 'a network failure', arrange: () => createMock.mockRejectedValue(new Error('connect ECONNREFUSED')) },
    {
      label: 'a rate limit',
      arrange: () => createMock.mockRejectedValue(Object.assign(new Error('rate limited'), { status: 429 })),
    },
    { label: 'a non-Error rejection', arrange: () => createMock.mockRejectedValue('socket hang up') },
    { label: 'unparseable output', arrange: () => createMock.mockResolvedValue(textReply('I think this is billing')) },
    { label: 'an empty reply', arrange: () => createMock.mockResolvedValue(textReply('   ')) },
    {
      label: 'no text block',
      arrange: () => createMock.mockResolvedValue({ content: [{ type: 'tool_use', id: 't', name: 'x', input: {} }] }),
    },
    { label: 'a JSON array', arrange: () => createMock.mockResolvedValue(textReply('["billing", "high"]')) },
  ])('degrades to null suggestions on $label', async ({ arrange }) => {
    arrange();

    const result = await configured().classify('Something went wrong');

    expect(result).toEqual({ suggested_category: null, suggested_priority: null });
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  it('coerces an unrecognized category to null and keeps a valid priority', async () => {
    createMock.mockResolvedValue(textReply('{"category": "spam", "priority": "high"}'));

    const result = await configured().classify('Please remove me from the newsletter');

    expect(result).toEqual({ suggested_category: null, suggested_priority: 'high' });
  });

  it('refines a technical guess for a password problem', async () => {
    createMock.mockResolvedValue(textReply('{"category": "technical", "priority": "medium"}'));

    const result = await configured().classify('Password reset is blocking our whole team');

    expect(result).toEqual({ suggested_category: 'account', suggested_priority: 'high' });
  });

  it('treats outages as technical and critical', async () => {
    createMock.mockResolvedValue(textReply('{"category": "account", "priority": "medium"}'));

    const result = await configured().classify('The platform is down and nobody can log in');

    expect(result).toEqual({ suggested_category: 'technical', suggested_priority: 'critical' });
  });
});

describe('parseJudgement', () => {
  it('reads JSON inside a markdown fence', () => {
    const reply = 'Here you go:\n```json\n{"category": "account", "priority": "low"}\n```';

    expect(parseJudgement(reply)).toEqual({ suggested_category: 'account', suggested_priority: 'low' });
  });

  it('normalizes case and whitespace', () => {
    expect(parseJudgement('{"category": " Technical ", "priority": "CRITICAL"}')).toEqual({
      suggested_category: 'technical',
      suggested_priority: 'critical',
    });
  });

  it('nulls missing or non-string fields', () => {
    expect(parseJudgement('{"priority": 3}')).toEqual({
      suggested_category: null,
      suggested_priority: null,
    });
  });

  it('throws an ExternalServiceError for non-JSON text', () => {
    expect(() => parseJudgement('billing, high')).toThrow(ExternalServiceError);
  });
});
