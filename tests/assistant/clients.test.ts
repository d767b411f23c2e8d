import Anthropic from '@anthropic-ai/sdk';
import OpenAI from 'openai';
import {
  ClaudeClient,
  ClaudeMessagesApi,
  ClaudeResponse,
  DEFAULT_CLAUDE_MODEL
} from '../../src/assistant/ai-engine/clients/claude-client';
import {
  DEFAULT_OPENAI_MODEL,
  OpenAIClient,
  OpenAICompletionsApi,
  OpenAIResponse,
  parseArguments
} from '../../src/assistant/ai-engine/clients/openai-client';
import { createLLMClient } from '../../src/assistant/ai-engine/client-factory';
import {
  AIEngineError,
  AIEngineErrorType,
  ChatSessionOptions,
  mapProviderError,
  normalizeHistory
} from '../../src/assistant/ai-engine/interface';
import { TOOL_DEFINITIONS } from '../../src/assistant/tools/tool-definitions';
import { createDefaultConfig } from '../../src/config';

const SESSION: ChatSessionOptions = {
  systemPrompt: 'You ARE Arjo.',
  history: [
    { role: 'assistant', content: 'stray greeting' },
    { role: 'user', content: 'Add a task' },
    { role: 'assistant', content: 'Done.' }
  ],
  tools: TOOL_DEFINITIONS.slice(0, 1),
  temperature: 0.2,
  maxTokens: 256
};

class FakeMessagesApi implements ClaudeMessagesApi {
  readonly calls: Anthropic.MessageCreateParamsNonStreaming[] = [];
  failWith: Error | null = null;

  constructor(private readonly responses: ClaudeResponse[]) {}

  async create(params: Anthropic.MessageCreateParamsNonStreaming): Promise<ClaudeResponse> {
    this.calls.push(params);
    if (this.failWith) {
      throw this.failWith;
    }
    const response = this.responses.shift();
    if (!response) {
      throw new Error('No response left');
    }
    return response;
  }
}

class FakeCompletionsApi implements OpenAICompletionsApi {
  readonly calls: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming[] = [];

  constructor(private readonly responses: OpenAIResponse[]) {}

  async create(params: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming): Promise<OpenAIResponse> {
    this.calls.push(params);
    const response = this.responses.shift();
    if (!response) {
      throw new Error('No response left');
    }
    return response;
  }
}

describe('ClaudeClient', () => {
  const usage = { input_tokens: 10, output_tokens: 5 };

  it('should require an API key', () => {
    expect(() => new ClaudeClient({ apiKey: '' }, new FakeMessagesApi([]))).toThrow('Claude API key is required');
  });

  it('should report a missing key as a configuration error', () => {
    try {
      new ClaudeClient({ apiKey: '' }, new FakeMessagesApi([]));
      throw new Error('expected the constructor to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(AIEngineError);
      expect(error instanceof AIEngineError && error.type).toBe(AIEngineErrorType.CONFIGURATION_ERROR);
      expect(error instanceof AIEngineError && error.retryable).toBe(false);
    }
  });

  it('should send the system prompt, tools and cleaned history', async () => {
    const api = new FakeMessagesApi([{ content: [{ type: 'text', text: 'Hello' }], stop_reason: 'end_turn', usage }]);
    const client = new ClaudeClient({ apiKey: 'test-key' }, api);

    const turn = await client.startChat(SESSION).sendMessage('hi');

    expect(turn).toEqual({
      text: 'Hello',
      toolCalls: [],
      usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 }
    });
    const params = api.calls[0];
    expect(params.model).toBe(DEFAULT_CLAUDE_MODEL);
    expect(params.system).toBe('You ARE Arjo.');
    expect(params.max_tokens).toBe(256);
    expect(params.temperature).toBe(0.2);
    expect(params.tools?.map(tool => tool.name)).toEqual(['add_task']);
    expect(params.messages).toEqual([
      { role: 'user', content: 'Add a task' },
      { role: 'assistant', content: 'Done.' },
      { role: 'user', content: 'hi' }
    ]);
  });

  it('should convert tool use and send results back', async () => {
    const api = new FakeMessagesApi([
      {
        content: [
          { type: 'text', text: 'On it. ' },
          { type: 'tool_use', id: 'toolu_1', name: 'add_task', input: { title: 'Book room' } }
        ],
        stop_reason: 'tool_use',
        usage
      },
      { content: [{ type: 'text', text: 'Added.' }], stop_reason: 'end_turn', usage }
    ]);
    const session = new ClaudeClient({ apiKey: 'test-key', model: 'claude-test' }, api).startChat({
      ...SESSION,
      history: []
    });

    const first = await session.sendMessage('book a room');
    const second = await session.sendToolResults([
      { callId: 'toolu_1', name: 'add_task', response: { type: 'error', message: 'Task title is required' } }
    ]);

    expect(first.text).toBe('On it. ');
    expect(first.toolCalls).toEqual([{ id: 'toolu_1', name: 'add_task', args: { title: 'Book room' } }]);
    expect(second.text).toBe('Added.');
    expect(api.calls[1].model).toBe('claude-test');
    expect(api.calls[1].messages).toHaveLength(3);
    expect(api.calls[1].messages[2]).toEqual({
      role: 'user',
      content: [
        {
          type: 'tool_result',
          tool_use_id: 'toolu_1',
          content: '{"type":"error","message":"Task title is required"}',
          is_error: true
        }
      ]
    });
  });

  it('should map failures and drop the unsent message', async () => {
    const api = new FakeMessagesApi([{ content: [{ type: 'text', text: 'ok' }], stop_reason: 'end_turn', usage }]);
    api.failWith = new Error('connection reset');
    const session = new ClaudeClient({ apiKey: 'test-key' }, api).startChat({ ...SESSION, history: [] });

    const error = await session.sendMessage('first').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(AIEngineError);
    expect(error instanceof AIEngineError && error.type).toBe(AIEngineErrorType.NETWORK_ERROR);

    api.failWith = null;
    await session.sendMessage('second');
    expect(api.calls[1].messages).toEqual([{ role: 'user', content: 'second' }]);
  });

  it('should describe itself', () => {
    expect(new ClaudeClient({ apiKey: 'test-key' }, new FakeMessagesApi([])).getClientInfo()).toEqual({
      provider: 'anthropic',
      model: DEFAULT_CLAUDE_MODEL,
      features: ['chat_completion', 'system_prompt', 'tool_use']
    });
  });
});

describe('OpenAIClient', () => {
  it('should put the system prompt first', async () => {
    const api = new FakeCompletionsApi([{ choices: [{ message: { content: 'Hello', tool_calls: undefined } }] }]);
    const client = new OpenAIClient({ apiKey: 'test-key' }, api);

    const turn = await client.startChat(SESSION).sendMessage('hi');

    expect(turn).toEqual({ text: 'Hello', toolCalls: [], usage: undefined });
    expect(api.calls[0].model).toBe(DEFAULT_OPENAI_MODEL);
    expect(api.calls[0].max_tokens).toBe(256);
    expect(api.calls[0].messages).toEqual([
      { role: 'system', content: 'You ARE Arjo.' },
      { role: 'user', content: 'Add a task' },
      { role: 'assistant', content: 'Done.' },
      { role: 'user', content: 'hi' }
    ]);
  });

  it('should parse tool calls and answer them with tool messages', async () => {
    const toolCall: OpenAI.Chat.ChatCompletionMessageToolCall = {
      id: 'call_a',
      type: 'function',
      function: { name: 'mark_task_done', arguments: '{"id":4}' }
    };
    const api = new FakeCompletionsApi([
      {
        choices: [{ message: { content: null, tool_calls: [toolCall] } }],
        usage: { prompt_tokens: 7, completion_tokens: 3, total_tokens: 10 }
      },
      { choices: [{ message: { content: 'Marked done.' } }] }
    ]);
    const session = new OpenAIClient({ apiKey: 'test-key' }, api).startChat({ ...SESSION, history: [] });

    const first = await session.sendMessage('finish #4');
    const second = await session.sendToolResults([
      { callId: 'call_a', name: 'mark_task_done', response: { type: 'done' } }
    ]);

    expect(first).toEqual({
      text: '',
      toolCalls: [{ id: 'call_a', name: 'mark_task_done', args: { id: 4 } }],
      usage: { promptTokens: 7, completionTokens: 3, totalTokens: 10 }
    });
    expect(second.text).toBe('Marked done.');
    expect(api.calls[1].messages.slice(1)).toEqual([
      { role: 'user', content: 'finish #4' },
      { role: 'assistant', content: null, tool_calls: [toolCall] },
      { role: 'tool', tool_call_id: 'call_a', content: '{"type":"done"}' }
    ]);
  });

  it('should fail on an empty choice list', async () => {
    const session = new OpenAIClient({ apiKey: 'test-key' }, new FakeCompletionsApi([{ choices: [] }])).startChat(
      SESSION
    );

    await expect(session.sendMessage('hi')).rejects.toThrow('OpenAI response contained no choices');
  });
});

describe('parseArguments', () => {
  it('should read JSON objects', () => {
    expect(parseArguments('{"title":"x"}')).toEqual({ title: 'x' });
  });

  it('should treat empty and non-object input as no arguments', () => {
    expect(parseArguments('')).toEqual({});
    expect(parseArguments('[1,2]')).toEqual({});
  });

  it('should reject malformed JSON', () => {
    expect(() => parseArguments('{"title":')).toThrow('Invalid tool call arguments: {"title":');
  });
});

describe('normalizeHistory', () => {
  it('should drop empty and leading assistant turns and merge repeats', () => {
    expect(
      normalizeHistory([
        { role: 'assistant', content: 'hi' },
        { role: 'user', content: 'one' },
        { role: 'user', content: '' },
        { role: 'user', content: 'two' },
        { role: 'assistant', content: 'ok' }
      ])
    ).toEqual([
      { role: 'user', content: 'one\n\ntwo' },
      { role: 'assistant', content: 'ok' }
    ]);
  });
});

describe('mapProviderError', () => {
  it('should map HTTP statuses', () => {
    const auth = mapProviderError('Claude', new Error('bad key'), 401);
    const limited = mapProviderError('Claude', new Error('slow down'), 429, undefined, '30');
    const server = mapProviderError('OpenAI', new Error('boom'), 503);
    const other = mapProviderError('OpenAI', new Error('bad request'), 400);

    expect([auth.type, auth.message, auth.retryable]).toEqual([
      AIEngineErrorType.AUTHENTICATION_ERROR,
      'Claude API authentication failed',
      false
    ]);
    expect([limited.type, limited.retryAfter]).toEqual([AIEngineErrorType.RATE_LIMIT_ERROR, 30]);
    expect(server.message).toBe('OpenAI API server error: boom');
    expect(other.message).toBe('OpenAI API error: bad request');
  });

  it('should classify errors without a status by message', () => {
    expect(mapProviderError('Claude', new Error('Request timed out')).message).toBe('Network error: Request timed out');
    expect(mapProviderError('Claude', 'weird').message).toBe('Unknown error: weird');
  });

  it('should pass engine errors through', () => {
    const original = AIEngineError.parsingError('bad');

    expect(mapProviderError('Claude', original)).toBe(original);
  });
});

describe('createLLMClient', () => {
  const assistant = createDefaultConfig().assistant;

  it('should return null without an API key', () => {
    expect(createLLMClient({ ...assistant, apiKey: '' })).toBeNull();
  });

  it('should build the client for the provider', () => {
    expect(createLLMClient({ ...assistant, apiKey: 'test-key' })?.getClientInfo().provider).toBe('anthropic');
    expect(
      createLLMClient({ ...assistant, provider: 'openai', apiKey: 'test-key', model: 'gpt-test' })?.getClientInfo()
    ).toMatchObject({ provider: 'openai', model: 'gpt-test' });
  });
});
