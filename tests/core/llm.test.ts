import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageToolCall,
} from 'openai/resources/chat/completions';
import { describe, expect, it, vi } from 'vitest';
import { z } from 'zod';

import { GatewayError, MalformedModelOutputError } from '../../src/core/errors.js';
import {
  OpenAiGateway,
  parseStructuredContent,
  toOpenAiMessages,
  type ChatMessage,
} from '../../src/core/llm.js';
import type { LoggerLike } from '../../src/core/logger.js';

const Verdict = { name: 'Verdict', schema: z.object({ ok: z.boolean(), score: z.number() }) };

function completion(content: string | null, toolCalls?: ChatCompletionMessageToolCall[]): ChatCompletion {
  return {
    id: 'cmpl-test',
    object: 'chat.completion',
    created: 1_700_000_000,
    model: 'test-model',
    choices: [
      {
        index: 0,
        finish_reason: toolCalls ? 'tool_calls' : 'stop',
        logprobs: null,
        message: { role: 'assistant', content, refusal: null, tool_calls: toolCalls },
      },
    ],
  };
}

function fakeCompletions(...replies: Array<ChatCompletion | Error>) {
  const bodies: ChatCompletionCreateParamsNonStreaming[] = [];
  const create = vi.fn(async (body: ChatCompletionCreateParamsNonStreaming) => {
    bodies.push(body);
    const next = replies.shift();
    if (!next) throw new Error('no more replies');
    if (next instanceof Error) throw next;
    return next;
  });
  return { api: { create }, bodies, create };
}

function spyLogger(): LoggerLike & { warn: ReturnType<typeof vi.fn> } {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

const OPTIONS = { model: 'test-model', temperature: 0, maxTokens: 256, retries: 2, retryBaseDelayMs: 0 };

describe('parseStructuredContent', () => {
  it('parses a bare JSON object', () => {
    expect(parseStructuredContent('{"ok": true, "score": 0.5}', Verdict)).toEqual({ ok: true, score: 0.5 });
  });

  it('parses a fenced JSON block', () => {
    const text = 'Here you go:\n```json\n{"ok": false, "score": 1}\n```\nThanks';
    expect(parseStructuredContent(text, Verdict)).toEqual({ ok: false, score: 1 });
  });

  it('finds the object inside surrounding prose', () => {
    expect(parseStructuredContent('Result: {"ok": true, "score": 2} done', Verdict)).toEqual({
      ok: true,
      score: 2,
    });
  });

  it('rejects replies without an object', () => {
    expect(() => parseStructuredContent('no json here', Verdict)).toThrow(
      'Verdict: reply contains no JSON object'
    );
  });

  it('rejects invalid JSON', () => {
    expect(() => parseStructuredContent('{ok: true}', Verdict)).toThrow(MalformedModelOutputError);
  });

  it('reports schema mismatches with the issues', () => {
    try {
      parseStructuredContent('{"ok": "yes", "score": 1}', Verdict);
      expect.unreachable('should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(MalformedModelOutputError);
      if (error instanceof MalformedModelOutputError) {
        expect(error.issues).toHaveLength(1);
        expect(error.issues[0]?.path).toEqual(['ok']);
        expect(error.raw).toBe('{"ok": "yes", "score": 1}');
      }
    }
  });
});

describe('toOpenAiMessages', () => {
  it('maps tool requests and observations', () => {
    const messages: ChatMessage[] = [
      { role: 'system', content: 'sys' },
      { role: 'user', content: 'list assets' },
      { role: 'assistant', content: '', toolCalls: [{ id: 'c-1', name: 'get_data', arguments: {} }] },
      { role: 'tool', content: 'Found 0 available assets:', toolCallId: 'c-1' },
      { role: 'assistant', content: 'None yet.' },
    ];

    expect(toOpenAiMessages(messages)).toEqual([
      { role: 'system', content: 'sys' },
      { role: 'user', content: 'list assets' },
      {
        role: 'assistant',
        content: null,
        tool_calls: [{ id: 'c-1', type: 'function', function: { name: 'get_data', arguments: '{}' } }],
      },
      { role: 'tool', content: 'Found 0 available assets:', tool_call_id: 'c-1' },
      { role: 'assistant', content: 'None yet.' },
    ]);
  });
});

describe('OpenAiGateway', () => {
  it('returns free-form text with the configured sampling options', async () => {
    const { api, bodies } = fakeCompletions(completion('Hello there'));
    const gateway = new OpenAiGateway(api, OPTIONS);

    const reply = await gateway.complete([{ role: 'user', content: 'hi' }]);

    expect(reply).toEqual({ content: 'Hello there' });
    expect(bodies[0]).toEqual({
      model: 'test-model',
      messages: [{ role: 'user', content: 'hi' }],
      temperature: 0,
      max_tokens: 256,
      stream: false,
    });
  });

  it('requests JSON output and validates it', async () => {
    const { api, bodies } = fakeCompletions(completion('{"ok": true, "score": 3}'));
    const gateway = new OpenAiGateway(api, OPTIONS);

    const value = await gateway.completeStructured([{ role: 'user', content: 'rate this' }], Verdict);

    expect(value).toEqual({ ok: true, score: 3 });
    expect(bodies[0]?.response_format).toEqual({ type: 'json_object' });
    const sent = bodies[0]?.messages ?? [];
    expect(sent).toHaveLength(2);
    expect(sent[1]?.role).toBe('system');
  });

  it('does not retry malformed structured output', async () => {
    const { api, create } = fakeCompletions(completion('not json'), completion('{"ok": true, "score": 1}'));
    const gateway = new OpenAiGateway(api, OPTIONS);

    await expect(gateway.completeStructured([{ role: 'user', content: 'x' }], Verdict)).rejects.toThrow(
      MalformedModelOutputError
    );
    expect(create).toHaveBeenCalledTimes(1);
  });

  it('maps tool calls and drops unparseable arguments', async () => {
    const logger = spyLogger();
    const { api, bodies } = fakeCompletions(
      completion(null, [
        { id: 'c-1', type: 'function', function: { name: 'get_last_value', arguments: '{"asset_key":"PUMP-7"}' } },
        { id: 'c-2', type: 'function', function: { name: 'get_data', arguments: '{broken' } },
      ])
    );
    const gateway = new OpenAiGateway(api, { ...OPTIONS, logger });

    const reply = await gateway.completeWithTools(
      [{ role: 'user', content: 'latest for PUMP-7' }],
      [{ name: 'get_last_value', description: 'latest', parameters: { type: 'object' } }]
    );

    expect(reply).toEqual({
      content: '',
      toolCalls: [
        { id: 'c-1', name: 'get_last_value', arguments: { asset_key: 'PUMP-7' } },
        { id: 'c-2', name: 'get_data', arguments: {} },
      ],
    });
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(bodies[0]?.tool_choice).toBe('auto');
    expect(bodies[0]?.tools).toEqual([
      {
        type: 'function',
        function: { name: 'get_last_value', description: 'latest', parameters: { type: 'object' } },
      },
    ]);
  });

  it('retries transient failures', async () => {
    const logger = spyLogger();
    const { api, create } = fakeCompletions(new Error('503 Service Unavailable'), completion('recovered'));
    const gateway = new OpenAiGateway(api, { ...OPTIONS, logger });

    const reply = await gateway.complete([{ role: 'user', content: 'hi' }]);

    expect(reply.content).toBe('recovered');
    expect(create).toHaveBeenCalledTimes(2);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('wraps terminal failures without retrying', async () => {
    const { api, create } = fakeCompletions(new Error('401 Unauthorized'));
    const gateway = new OpenAiGateway(api, OPTIONS);

    const failure = gateway.complete([{ role: 'user', content: 'hi' }]);

    await expect(failure).rejects.toBeInstanceOf(GatewayError);
    await expect(failure).rejects.toThrow('Model call failed: 401 Unauthorized');
    await expect(failure).rejects.toMatchObject({ retryable: false });
    expect(create).toHaveBeenCalledTimes(1);
  });

  it('gives up after the configured retries', async () => {
    const { api, create } = fakeCompletions(
      new Error('request timed out'),
      new Error('request timed out'),
      new Error('request timed out')
    );
    const gateway = new OpenAiGateway(api, OPTIONS);

    await expect(gateway.complete([{ role: 'user', content: 'hi' }])).rejects.toMatchObject({
      name: 'GatewayError',
      retryable: true,
    });
    expect(create).toHaveBeenCalledTimes(3);
  });
});
