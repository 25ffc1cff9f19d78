// src/lib/llm.test.ts
import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  OpenAiCompletionClient,
  AnthropicCompletionClient,
  createCompletionClient,
  stripCodeFences,
} from './llm.js';

const mockCreate = vi.fn();
const mockMessagesCreate = vi.fn();

vi.mock('openai', () => {
  return {
    OpenAI: vi.fn(function (this: { chat: unknown }) {
      this.chat = {
        completions: {
          create: mockCreate,
        },
      };
    }),
  };
});

vi.mock('@anthropic-ai/sdk', () => {
  return {
    default: vi.fn(function (this: { messages: unknown }) {
      this.messages = {
        create: mockMessagesCreate,
      };
    }),
  };
});

const request = {
  system: 'You are terse.',
  prompt: 'Say hi',
  temperature: 0.1,
  maxTokens: 10,
};

describe('OpenAiCompletionClient', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should send system and user messages with sampling parameters', async () => {
    mockCreate.mockResolvedValue({ choices: [{ message: { content: 'hi' } }] });

    const client = new OpenAiCompletionClient('test-api-key', 'test-model');
    const text = await client.complete(request);

    expect(text).toBe('hi');
    expect(mockCreate).toHaveBeenCalledWith({
      model: 'test-model',
      temperature: 0.1,
      max_tokens: 10,
      messages: [
        { role: 'system', content: 'You are terse.' },
        { role: 'user', content: 'Say hi' },
      ],
    });
  });

  it('should return an empty string when there are no choices', async () => {
    mockCreate.mockResolvedValue({ choices: [] });

    const client = new OpenAiCompletionClient('test-api-key');

    expect(await client.complete(request)).toBe('');
  });

  it('should propagate API errors', async () => {
    mockCreate.mockRejectedValue(new Error('rate limited'));

    const client = new OpenAiCompletionClient('test-api-key');

    await expect(client.complete(request)).rejects.toThrow('rate limited');
  });
});

describe('AnthropicCompletionClient', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should return the first text block', async () => {
    mockMessagesCreate.mockResolvedValue({ content: [{ type: 'text', text: 'hello' }] });

    const client = new AnthropicCompletionClient('test-api-key', 'test-model');

    expect(await client.complete(request)).toBe('hello');
    expect(mockMessagesCreate).toHaveBeenCalledWith({
      model: 'test-model',
      max_tokens: 10,
      temperature: 0.1,
      system: 'You are terse.',
      messages: [{ role: 'user', content: 'Say hi' }],
    });
  });

  it('should return an empty string for non-text content', async () => {
    mockMessagesCreate.mockResolvedValue({ content: [{ type: 'tool_use' }] });

    const client = new AnthropicCompletionClient('test-api-key');

    expect(await client.complete(request)).toBe('');
  });
});

describe('createCompletionClient', () => {
  it('should throw if the API key is missing', () => {
    expect(() => createCompletionClient({ provider: 'openai' })).toThrow(
      'AI_API_KEY environment variable is required'
    );
  });

  it('should pick the client by provider', () => {
    expect(createCompletionClient({ provider: 'openai', apiKey: 'test-api-key' })).toBeInstanceOf(
      OpenAiCompletionClient
    );
    expect(
      createCompletionClient({ provider: 'anthropic', apiKey: 'test-api-key' })
    ).toBeInstanceOf(AnthropicCompletionClient);
  });
});

describe('stripCodeFences', () => {
  it('should strip json and sql fences', () => {
    expect(stripCodeFences('```json\n{"a":1}\n```')).toBe('{"a":1}');
    expect(stripCodeFences('```sql\nSELECT 1\n```')).toBe('SELECT 1');
    expect(stripCodeFences('```\nplain\n```')).toBe('plain');
  });

  it('should leave unfenced text alone apart from whitespace', () => {
    expect(stripCodeFences('  SELECT * FROM events  ')).toBe('SELECT * FROM events');
  });
});
