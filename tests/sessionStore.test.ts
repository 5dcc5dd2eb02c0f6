import { SessionStore, trimHistory } from '../src/core/sessionStore';
import { ConversationTurn } from '../src/core/types';

function clock(start = 1_000): { now: () => number; tick: (ms?: number) => void } {
  let current = start;
  return {
    now: () => current,
    tick: (ms = 1) => {
      current += ms;
    },
  };
}

function pairedHistory(pairs: number): ConversationTurn[] {
  const history: ConversationTurn[] = [];
  for (let index = 0; index < pairs; index++) {
    history.push({ role: 'assistant', content: '', toolCalls: [{ id: `c${index}`, name: 'list_torrents', input: {} }] });
    history.push({ role: 'tool', toolName: 'list_torrents', toolCallId: `c${index}`, content: `r${index}` });
  }
  return history;
}

function assertPaired(history: ConversationTurn[]): void {
  const calls = new Set<string>();
  for (const turn of history) {
    if (turn.role === 'assistant') {
      turn.toolCalls.forEach((call) => calls.add(call.id));
    }
    if (turn.role === 'tool') {
      expect(calls.has(turn.toolCallId)).toBe(true);
    }
  }
}

// ─── appends ────────────────────────────────────────────────────────────────

describe('SessionStore appends', () => {
  test('creates logs lazily', () => {
    const store = new SessionStore({ maxMessages: 10 });
    expect(store.has('s1')).toBe(false);
    const log = store.getOrCreate('s1');
    expect(log.history).toEqual([]);
    expect(log.maxMessages).toBe(10);
    expect(store.size).toBe(1);
  });

  test('merges tool calls into a trailing assistant message without text', () => {
    const store = new SessionStore({ maxMessages: 10 });
    store.appendUser('s1', 'hi');
    store.appendToolCall('s1', { id: 'a', name: 'search_movie', input: { query: 'A' } });
    store.appendToolCall('s1', { id: 'b', name: 'search_series', input: { query: 'A' } });

    expect(store.snapshot('s1')).toEqual([
      { role: 'user', content: 'hi' },
      {
        role: 'assistant',
        content: '',
        toolCalls: [
          { id: 'a', name: 'search_movie', input: { query: 'A' } },
          { id: 'b', name: 'search_series', input: { query: 'A' } },
        ],
      },
    ]);
  });

  test('applies last-write-wins on an id collision', () => {
    const store = new SessionStore({ maxMessages: 10 });
    store.appendToolCall('s1', { id: 'a', name: 'download_series', input: { tvdb_id: 1 } });
    store.appendToolCall('s1', { id: 'a', name: '', input: { tvdb_id: 1, seasons: [1] } });

    expect(store.snapshot('s1')).toEqual([
      {
        role: 'assistant',
        content: '',
        toolCalls: [{ id: 'a', name: 'download_series', input: { tvdb_id: 1, seasons: [1] } }],
      },
    ]);
  });

  test('opens a new assistant message after one with text', () => {
    const store = new SessionStore({ maxMessages: 10 });
    store.appendAssistantText('s1', 'Let me check.');
    store.appendToolCall('s1', { id: 'a', name: 'list_torrents', input: {} });
    store.appendToolResult('s1', 'list_torrents', 'none', 'a');

    const history = store.snapshot('s1');
    expect(history).toHaveLength(3);
    expect(history?.[1]).toEqual({
      role: 'assistant',
      content: '',
      toolCalls: [{ id: 'a', name: 'list_torrents', input: {} }],
    });
    expect(history?.[2]).toEqual({ role: 'tool', toolName: 'list_torrents', toolCallId: 'a', content: 'none' });
  });

  test('sets text on the message holding a call', () => {
    const store = new SessionStore({ maxMessages: 10 });
    store.appendToolCall('s1', { id: 'a', name: 'list_torrents', input: {} });
    store.appendToolResult('s1', 'list_torrents', 'The qBittorrent request failed.', 'a', true);

    expect(store.setToolCallText('s1', 'a', 'Checking your torrents.')).toBe(true);
    expect(store.setToolCallText('s1', 'missing', 'ignored')).toBe(false);
    expect(store.snapshot('s1')).toEqual([
      { role: 'assistant', content: 'Checking your torrents.', toolCalls: [{ id: 'a', name: 'list_torrents', input: {} }] },
      { role: 'tool', toolName: 'list_torrents', toolCallId: 'a', content: 'The qBittorrent request failed.', isError: true },
    ]);
  });

  test('snapshots are detached copies', () => {
    const store = new SessionStore({ maxMessages: 10 });
    store.appendToolCall('s1', { id: 'a', name: 'search_movie', input: { query: 'A' } });
    const snapshot = store.snapshot('s1');
    const first = snapshot?.[0];
    if (first?.role === 'assistant') {
      first.toolCalls[0].input.query = 'changed';
    }

    const again = store.snapshot('s1')?.[0];
    expect(again?.role === 'assistant' && again.toolCalls[0].input.query).toBe('A');
  });

  test('clear reports whether the session existed', () => {
    const store = new SessionStore({ maxMessages: 10 });
    store.appendUser('s1', 'hi');
    expect(store.clear('s1')).toBe(true);
    expect(store.clear('s1')).toBe(false);
    expect(store.snapshot('s1')).toBeUndefined();
  });
});

// ─── eviction ───────────────────────────────────────────────────────────────

describe('SessionStore.evictExcess', () => {
  test('removes exactly the excess', () => {
    const time = clock();
    const store = new SessionStore({ maxMessages: 10, now: time.now });
    for (let index = 0; index < 15; index++) {
      store.getOrCreate(`s${index}`);
      time.tick();
    }

    expect(store.evictExcess(10)).toBe(5);
    expect(store.size).toBe(10);
  });

  test('evicts least recently used first', () => {
    const time = clock();
    const store = new SessionStore({ maxMessages: 10, now: time.now });
    store.getOrCreate('a');
    time.tick();
    store.getOrCreate('b');
    time.tick();
    store.getOrCreate('c');
    time.tick();
    store.getOrCreate('a');

    expect(store.evictExcess(2)).toBe(1);
    expect(store.has('b')).toBe(false);
    expect(store.has('a')).toBe(true);
    expect(store.has('c')).toBe(true);
  });

  test('breaks ties by session id', () => {
    const store = new SessionStore({ maxMessages: 10, now: () => 5 });
    store.getOrCreate('zeta');
    store.getOrCreate('alpha');

    store.evictExcess(1);
    expect(store.has('alpha')).toBe(false);
    expect(store.has('zeta')).toBe(true);
  });

  test('skips pinned sessions', () => {
    const time = clock();
    const store = new SessionStore({ maxMessages: 10, now: time.now });
    store.getOrCreate('busy');
    time.tick();
    store.getOrCreate('idle');
    store.pin('busy');

    expect(store.evictExcess(1)).toBe(1);
    expect(store.has('busy')).toBe(true);

    store.unpin('busy');
    store.getOrCreate('other');
    expect(store.evictExcess(1)).toBe(1);
    expect(store.has('busy')).toBe(false);
  });

  test('does nothing under the bound', () => {
    const store = new SessionStore({ maxMessages: 10 });
    store.getOrCreate('a');
    expect(store.evictExcess(5)).toBe(0);
  });
});

// ─── trimming ───────────────────────────────────────────────────────────────

describe('trimHistory', () => {
  test('keeps head and tail when nothing straddles a cut', () => {
    const history: ConversationTurn[] = Array.from({ length: 8 }, (_, index) => ({
      role: 'user' as const,
      content: `m${index}`,
    }));

    const trimmed = trimHistory(history, 4, 2);
    expect(trimmed.map((turn) => turn.content)).toEqual(['m0', 'm1', 'm6', 'm7']);
  });

  test('leaves a short history alone', () => {
    const history: ConversationTurn[] = [{ role: 'user', content: 'hi' }];
    expect(trimHistory(history, 4, 2)).toEqual(history);
  });

  test('never separates a call from its result', () => {
    // indices: 0 user, 1 call c0, 2 result c0, ... the head cut falls between 1 and 2
    const history: ConversationTurn[] = [{ role: 'user', content: 'start' }, ...pairedHistory(6)];

    const trimmed = trimHistory(history, 6, 2);
    assertPaired(trimmed);
    expect(trimmed.map((turn) => (turn.role === 'tool' ? turn.toolCallId : turn.role))).toEqual([
      'user',
      'assistant',
      'c0',
      'assistant',
      'c4',
      'assistant',
      'c5',
    ]);
  });

  test('widens both cuts instead of orphaning a result', () => {
    // 13 messages, keep 4 head + 3 tail: the head cut splits c0, the tail cut splits c3
    const history: ConversationTurn[] = [
      { role: 'user', content: 'a' },
      { role: 'user', content: 'b' },
      { role: 'user', content: 'c' },
      ...pairedHistory(5),
    ];

    const trimmed = trimHistory(history, 7, 4);
    assertPaired(trimmed);
    expect(trimmed).toHaveLength(9);
  });

  test('holds the bound when a head call is answered in the tail', () => {
    const history: ConversationTurn[] = [
      { role: 'user', content: 'a' },
      { role: 'assistant', content: '', toolCalls: [{ id: 'c0', name: 'list_torrents', input: {} }] },
      { role: 'user', content: 'b' },
      { role: 'user', content: 'c' },
      { role: 'user', content: 'd' },
      { role: 'user', content: 'e' },
      { role: 'tool', toolName: 'list_torrents', toolCallId: 'c0', content: 'r0' },
    ];

    const trimmed = trimHistory(history, 4, 2);
    assertPaired(trimmed);
    expect(trimmed).toEqual([history[0], history[1], history[5], history[6]]);
  });

  test('store.trim reports the number removed', () => {
    const store = new SessionStore({ maxMessages: 4, keepHead: 2 });
    for (let index = 0; index < 6; index++) {
      store.appendUser('s1', `m${index}`);
    }
    expect(store.trim('s1')).toBe(2);
    expect(store.snapshot('s1')?.map((turn) => turn.content)).toEqual(['m0', 'm1', 'm4', 'm5']);
  });
});
