import { ConverseStreamOutput, ThrottlingException } from '@aws-sdk/client-bedrock-runtime';
import { DecisionEvent, ModelRequest } from '../src/core/types';
import { AnthropicProvider, mapAnthropicEvents, toAnthropicMessages } from '../src/providers/anthropicProvider';
import { mapConverseStream, toBedrockMessages, toDocument } from '../src/providers/bedrockProvider';
import { buildProvider, ProviderConfig } from '../src/providers';
import { OllamaProvider, mapOllamaLines, toOllamaMessages } from '../src/providers/ollamaProvider';
import { ProviderError, ServerSentEvent, readLines, readServerSentEvents } from '../src/providers/streaming';

// ─── Helpers ────────────────────────────────────────────────────────────────

async function* from<T>(items: T[]): AsyncIterable<T> {
  for (const item of items) {
    yield item;
  }
}

async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}

function byteStream(chunks: Uint8Array[]): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      chunks.forEach((chunk) => controller.enqueue(chunk));
      controller.close();
    },
  });
}

const encode = (text: string) => new TextEncoder().encode(text);

function sse(type: string, payload: Record<string, unknown>): ServerSentEvent {
  return { event: type, data: JSON.stringify({ type, ...payload }) };
}

const REQUEST: ModelRequest = {
  system: 'system prompt',
  history: [
    { role: 'user', content: 'find x' },
    { role: 'assistant', content: 'Which one?', toolCalls: [] },
  ],
  input: 'the first',
  scratchpad: [
    { role: 'assistant', content: '', toolCalls: [{ id: 't1', name: 'download_movie', input: { tmdb_id: 1 } }] },
    { role: 'tool', toolName: 'download_movie', toolCallId: 't1', content: 'Added' },
  ],
  tools: [],
};

const FAILED_REQUEST: ModelRequest = {
  ...REQUEST,
  scratchpad: [
    REQUEST.scratchpad[0],
    { role: 'tool', toolName: 'download_movie', toolCallId: 't1', content: 'The download_movie tool failed: boom', isError: true },
  ],
};

afterEach(() => {
  jest.restoreAllMocks();
});

// ─── Stream plumbing ────────────────────────────────────────────────────────

describe('readLines', () => {
  test('splits across chunk boundaries and strips carriage returns', async () => {
    const lines = await collect(readLines(byteStream([encode('one\r\ntw'), encode('o\n\nthree')])));
    expect(lines).toEqual(['one', 'two', '', 'three']);
  });

  test('keeps multi-byte characters split between chunks', async () => {
    const bytes = encode('café\n');
    const lines = await collect(readLines(byteStream([bytes.slice(0, 4), bytes.slice(4)])));
    expect(lines).toEqual(['café']);
  });
});

describe('readServerSentEvents', () => {
  test('groups fields into events and skips comments', async () => {
    const events = await collect(readServerSentEvents(from([
      'data: {"a":1}',
      '',
      'event: ping',
      'data: {}',
      '',
      ': keep-alive',
      'data: first',
      'data: second',
    ])));

    expect(events).toEqual([
      { event: 'message', data: '{"a":1}' },
      { event: 'ping', data: '{}' },
      { event: 'message', data: 'first\nsecond' },
    ]);
  });
});

// ─── Ollama ─────────────────────────────────────────────────────────────────

describe('Ollama', () => {
  test('builds chat messages with tool turns', () => {
    expect(toOllamaMessages(REQUEST)).toEqual([
      { role: 'system', content: 'system prompt' },
      { role: 'user', content: 'find x' },
      { role: 'assistant', content: 'Which one?' },
      { role: 'user', content: 'the first' },
      { role: 'assistant', content: '', tool_calls: [{ function: { name: 'download_movie', arguments: { tmdb_id: 1 } } }] },
      { role: 'tool', content: 'Added', tool_name: 'download_movie' },
    ]);
  });

  test('maps content and whole tool calls', async () => {
    const events = await collect(mapOllamaLines(from([
      '{"message":{"role":"assistant","content":"Hel"}}',
      '',
      '{"message":{"content":"lo","tool_calls":[{"function":{"name":"search_movie","arguments":{"query":"Dune"}}}]}}',
      '{"done":true}',
    ])));

    expect(events).toEqual([
      { type: 'text', text: 'Hel' },
      { type: 'text', text: 'lo' },
      {
        type: 'tool_call_fragment',
        id: expect.any(String),
        name: 'search_movie',
        argumentsText: '{"query":"Dune"}',
        final: true,
      },
    ]);
  });

  test('raises on an error line', async () => {
    await expect(collect(mapOllamaLines(from(['{"error":"model not found"}'])))).rejects.toThrow(
      new ProviderError('ollama', 'model not found'),
    );
  });

  test('raises on an unreadable line', async () => {
    await expect(collect(mapOllamaLines(from(['oops'])))).rejects.toThrow('unreadable stream line: oops');
  });

  test('surfaces HTTP failures', async () => {
    jest.spyOn(global, 'fetch').mockResolvedValue(new Response('boom', { status: 500 }));
    const provider = new OllamaProvider({ host: 'http://ollama.test:11434', model: 'test-model' });

    await expect(collect(provider.streamResponse(REQUEST))).rejects.toThrow('ollama_http_500:boom');
  });
});

// ─── Anthropic ──────────────────────────────────────────────────────────────

describe('Anthropic', () => {
  test('sends tool results as user blocks', () => {
    expect(toAnthropicMessages(REQUEST)).toEqual([
      { role: 'user', content: [{ type: 'text', text: 'find x' }] },
      { role: 'assistant', content: [{ type: 'text', text: 'Which one?' }] },
      { role: 'user', content: [{ type: 'text', text: 'the first' }] },
      {
        role: 'assistant',
        content: [{ type: 'tool_use', id: 't1', name: 'download_movie', input: { tmdb_id: 1 } }],
      },
      { role: 'user', content: [{ type: 'tool_result', tool_use_id: 't1', content: 'Added' }] },
    ]);
  });

  test('flags failed tool results', () => {
    const messages = toAnthropicMessages(FAILED_REQUEST);
    expect(messages[messages.length - 1]).toEqual({
      role: 'user',
      content: [{ type: 'tool_result', tool_use_id: 't1', content: 'The download_movie tool failed: boom', is_error: true }],
    });
  });

  test('merges consecutive messages of the same role', () => {
    const messages = toAnthropicMessages({ ...REQUEST, history: [{ role: 'user', content: 'hello' }], scratchpad: [] });
    expect(messages).toEqual([
      {
        role: 'user',
        content: [
          { type: 'text', text: 'hello' },
          { type: 'text', text: 'the first' },
        ],
      },
    ]);
  });

  test('maps text deltas and streamed tool input', async () => {
    const events = await collect(mapAnthropicEvents(from([
      sse('message_start', { message: {} }),
      sse('content_block_start', { index: 0, content_block: { type: 'text', text: '' } }),
      sse('content_block_delta', { index: 0, delta: { type: 'text_delta', text: 'Let me check.' } }),
      sse('content_block_stop', { index: 0 }),
      sse('content_block_start', { index: 1, content_block: { type: 'tool_use', id: 'toolu_1', name: 'search_movie', input: {} } }),
      { event: 'ping', data: '{"type": "ping"}' },
      sse('content_block_delta', { index: 1, delta: { type: 'input_json_delta', partial_json: '{"query": ' } }),
      sse('content_block_delta', { index: 1, delta: { type: 'input_json_delta', partial_json: '"Dune"}' } }),
      sse('content_block_stop', { index: 1 }),
      sse('message_stop', {}),
    ])));

    const expected: DecisionEvent[] = [
      { type: 'text', text: 'Let me check.' },
      { type: 'tool_call_fragment', id: 'toolu_1', name: 'search_movie', argumentsText: '' },
      { type: 'tool_call_fragment', id: 'toolu_1', argumentsText: '{"query": ' },
      { type: 'tool_call_fragment', id: 'toolu_1', argumentsText: '"Dune"}' },
      { type: 'tool_call_fragment', id: 'toolu_1', argumentsText: '', final: true },
    ];
    expect(events).toEqual(expected);
  });

  test('raises on an error event', async () => {
    const events = from([sse('error', { error: { type: 'overloaded_error', message: 'Overloaded' } })]);
    await expect(collect(mapAnthropicEvents(events))).rejects.toThrow('Overloaded');
  });

  test('posts a streaming request and reads the reply', async () => {
    const body = [
      'event: content_block_delta',
      'data: {"type":"content_block_delta","index":0,"delta":{"type":"text_delta","text":"Hi!"}}',
      '',
      '',
    ].join('\n');
    const fetchSpy = jest.spyOn(global, 'fetch').mockResolvedValue(new Response(body));
    const provider = new AnthropicProvider({
      apiKey: 'test-key',
      model: 'test-model',
      maxTokens: 256,
      baseUrl: 'http://anthropic.test',
    });

    const events = await collect(provider.streamResponse({ ...REQUEST, history: [], scratchpad: [] }));

    expect(events).toEqual([{ type: 'text', text: 'Hi!' }]);
    const [url, init] = fetchSpy.mock.calls[0];
    expect(String(url)).toBe('http://anthropic.test/v1/messages');
    expect(init?.headers).toEqual({
      'content-type': 'application/json',
      'x-api-key': 'test-key',
      'anthropic-version': '2023-06-01',
    });
    expect(JSON.parse(String(init?.body))).toEqual({
      model: 'test-model',
      max_tokens: 256,
      stream: true,
      system: 'system prompt',
      messages: [{ role: 'user', content: [{ type: 'text', text: 'the first' }] }],
    });
  });
});

// ─── Bedrock ────────────────────────────────────────────────────────────────

describe('Bedrock', () => {
  test('maps ConverseStream chunks', async () => {
    const chunks: ConverseStreamOutput[] = [
      { messageStart: { role: 'assistant' } },
      { contentBlockDelta: { contentBlockIndex: 0, delta: { text: 'Searching.' } } },
      { contentBlockStop: { contentBlockIndex: 0 } },
      { contentBlockStart: { contentBlockIndex: 1, start: { toolUse: { toolUseId: 'tu1', name: 'search_series' } } } },
      { contentBlockDelta: { contentBlockIndex: 1, delta: { toolUse: { input: '{"query":"Test"}' } } } },
      { contentBlockStop: { contentBlockIndex: 1 } },
      { messageStop: { stopReason: 'tool_use' } },
    ];

    await expect(collect(mapConverseStream(from(chunks)))).resolves.toEqual([
      { type: 'text', text: 'Searching.' },
      { type: 'tool_call_fragment', id: 'tu1', name: 'search_series', argumentsText: '' },
      { type: 'tool_call_fragment', id: 'tu1', argumentsText: '{"query":"Test"}' },
      { type: 'tool_call_fragment', id: 'tu1', argumentsText: '', final: true },
    ]);
  });

  test('raises on a stream exception', async () => {
    const chunks: ConverseStreamOutput[] = [
      { throttlingException: new ThrottlingException({ message: 'Too many requests', $metadata: {} }) },
    ];
    await expect(collect(mapConverseStream(from(chunks)))).rejects.toThrow('Too many requests');
  });

  test('builds Converse messages with tool blocks', () => {
    expect(toBedrockMessages(REQUEST)).toEqual([
      { role: 'user', content: [{ text: 'find x' }] },
      { role: 'assistant', content: [{ text: 'Which one?' }] },
      { role: 'user', content: [{ text: 'the first' }] },
      { role: 'assistant', content: [{ toolUse: { toolUseId: 't1', name: 'download_movie', input: { tmdb_id: 1 } } }] },
      {
        role: 'user',
        content: [{ toolResult: { toolUseId: 't1', content: [{ text: 'Added' }], status: 'success' } }],
      },
    ]);
  });

  test('marks failed tool results with an error status', () => {
    const messages = toBedrockMessages(FAILED_REQUEST);
    expect(messages[messages.length - 1]).toEqual({
      role: 'user',
      content: [
        { toolResult: { toolUseId: 't1', content: [{ text: 'The download_movie tool failed: boom' }], status: 'error' } },
      ],
    });
  });

  test('converts values into documents', () => {
    expect(toDocument({ a: [1, 'two', null], b: undefined, c: { d: true } })).toEqual({
      a: [1, 'two', null],
      c: { d: true },
    });
  });
});

// ─── Selection ──────────────────────────────────────────────────────────────

describe('buildProvider', () => {
  const config: ProviderConfig = {
    modelProvider: 'ollama',
    ollamaHost: 'http://localhost:11434',
    ollamaModel: 'test-model',
    anthropicModel: 'test-model',
    anthropicMaxTokens: 1024,
    bedrockModelId: 'test-model',
    awsRegion: 'us-east-1',
  };

  test('builds the configured provider', () => {
    expect(buildProvider(config).name).toBe('ollama');
    expect(buildProvider({ ...config, modelProvider: 'anthropic', anthropicApiKey: 'test-key' }).name).toBe('anthropic');
    expect(buildProvider({ ...config, modelProvider: 'bedrock' }).name).toBe('bedrock');
  });

  test('requires an api key for Anthropic', () => {
    expect(() => buildProvider({ ...config, modelProvider: 'anthropic' })).toThrow(
      'ANTHROPIC_API_KEY is required when MODEL_PROVIDER=anthropic',
    );
  });
});
