import { mergeToolCall } from "./historyReconciler.js";
import { logger } from "./logger.js";
import { ConversationLog, ConversationTurn, ToolCallRequest, ToolResultTurn } from "./types.js";

export interface SessionStoreOptions {
  maxMessages: number;
  keepHead?: number;
  now?: () => number;
}

export const DEFAULT_KEEP_HEAD = 10;

/**
 * Process-wide registry of conversation logs keyed by session id. Every
 * mutation is synchronous, so on the event loop each one runs to completion
 * before any other turn can observe the log.
 */
export class SessionStore {
  private readonly sessions = new Map<string, ConversationLog>();
  private readonly pins = new Map<string, number>();
  private readonly maxMessages: number;
  private readonly keepHead: number;
  private readonly now: () => number;

  constructor(options: SessionStoreOptions) {
    this.maxMessages = options.maxMessages;
    this.keepHead = Math.min(options.keepHead ?? DEFAULT_KEEP_HEAD, options.maxMessages);
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.sessions.size;
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  getOrCreate(sessionId: string): ConversationLog {
    const existing = this.sessions.get(sessionId);
    if (existing) {
      existing.lastAccessAt = this.now();
      return existing;
    }

    const timestamp = this.now();
    const created: ConversationLog = {
      sessionId,
      history: [],
      maxMessages: this.maxMessages,
      createdAt: timestamp,
      lastAccessAt: timestamp,
    };

    this.sessions.set(sessionId, created);
    logger.debug("session created", { sessionId });
    return created;
  }

  appendUser(sessionId: string, text: string): void {
    this.getOrCreate(sessionId).history.push({ role: "user", content: text });
  }

  appendAssistantText(sessionId: string, text: string): void {
    this.getOrCreate(sessionId).history.push({ role: "assistant", content: text, toolCalls: [] });
  }

  /**
   * Adds the call to the trailing assistant message while that message has
   * no text of its own; otherwise opens a new assistant message.
   */
  appendToolCall(sessionId: string, call: ToolCallRequest): void {
    const { history } = this.getOrCreate(sessionId);
    const trailing = history[history.length - 1];
    const copy: ToolCallRequest = { ...call, input: { ...call.input } };

    if (trailing?.role === "assistant" && !trailing.content) {
      const index = trailing.toolCalls.findIndex((existing) => existing.id === call.id);
      if (index >= 0) {
        trailing.toolCalls[index] = mergeToolCall(trailing.toolCalls[index], copy);
      } else {
        trailing.toolCalls.push(copy);
      }
      return;
    }

    history.push({ role: "assistant", content: "", toolCalls: [copy] });
  }

  /** Sets the text of the assistant message holding `callId`. */
  setToolCallText(sessionId: string, callId: string, text: string): boolean {
    const { history } = this.getOrCreate(sessionId);
    for (let index = history.length - 1; index >= 0; index--) {
      const turn = history[index];
      if (turn.role === "assistant" && turn.toolCalls.some((call) => call.id === callId)) {
        turn.content = text;
        return true;
      }
    }
    return false;
  }

  /** Pairing with the call is checked during reconciliation, not here. */
  appendToolResult(sessionId: string, toolName: string, content: string, toolCallId: string, failed = false): void {
    this.getOrCreate(sessionId).history.push(toolResultTurn(toolName, toolCallId, content, failed));
  }

  clear(sessionId: string): boolean {
    const existed = this.sessions.delete(sessionId);
    if (existed) {
      logger.info("session cleared", { sessionId });
    }
    return existed;
  }

  /** Copy of the history for display; safe to iterate while turns run. */
  snapshot(sessionId: string): ConversationTurn[] | undefined {
    const log = this.sessions.get(sessionId);
    if (!log) {
      return undefined;
    }
    return log.history.map((turn) =>
      turn.role === "assistant"
        ? { ...turn, toolCalls: turn.toolCalls.map((call) => ({ ...call, input: { ...call.input } })) }
        : { ...turn },
    );
  }

  trim(sessionId: string): number {
    const log = this.sessions.get(sessionId);
    if (!log) {
      return 0;
    }

    const before = log.history.length;
    log.history = trimHistory(log.history, log.maxMessages, this.keepHead);
    const removed = before - log.history.length;
    if (removed > 0) {
      logger.debug(`trimmed ${removed} messages`, { sessionId });
    }
    return removed;
  }

  /** Marks a session as busy so eviction leaves it alone. */
  pin(sessionId: string): void {
    this.pins.set(sessionId, (this.pins.get(sessionId) ?? 0) + 1);
  }

  unpin(sessionId: string): void {
    const count = (this.pins.get(sessionId) ?? 0) - 1;
    if (count > 0) {
      this.pins.set(sessionId, count);
    } else {
      this.pins.delete(sessionId);
    }
  }

  /**
   * Evicts least-recently-used sessions until at most `maxSessions` remain.
   * Ties are broken by session id. Pinned sessions are skipped.
   */
  evictExcess(maxSessions: number): number {
    const excess = this.sessions.size - maxSessions;
    if (excess <= 0) {
      return 0;
    }

    const candidates = [...this.sessions.values()]
      .filter((log) => !this.pins.has(log.sessionId))
      .sort((a, b) => a.lastAccessAt - b.lastAccessAt || compareIds(a.sessionId, b.sessionId));

    let removed = 0;
    for (const log of candidates.slice(0, excess)) {
      this.sessions.delete(log.sessionId);
      removed++;
    }

    if (removed > 0) {
      logger.info(`evicted ${removed} sessions`, undefined, { remaining: this.sessions.size });
    }
    return removed;
  }
}

export function toolResultTurn(toolName: string, toolCallId: string, content: string, failed: boolean): ToolResultTurn {
  const turn: ToolResultTurn = { role: "tool", toolName, toolCallId, content };
  if (failed) {
    turn.isError = true;
  }
  return turn;
}

function compareIds(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Keeps the first `keepHead` messages and the most recent
 * `maxMessages - keepHead`. The removed span shrinks until no tool call and
 * its result sit on opposite sides of a cut; a pair split across the whole
 * span keeps both ends.
 */
export function trimHistory(
  history: readonly ConversationTurn[],
  maxMessages: number,
  keepHead: number = DEFAULT_KEEP_HEAD,
): ConversationTurn[] {
  if (history.length <= maxMessages) {
    return [...history];
  }

  const head = Math.min(keepHead, maxMessages);
  let start = head;
  let end = history.length - (maxMessages - head);

  const pairs = toolCallPairs(history);
  let changed = true;
  while (changed && start < end) {
    changed = false;
    for (const [callIndex, resultIndex] of pairs) {
      if (callIndex < start && resultIndex >= start && resultIndex < end) {
        start = resultIndex + 1;
        changed = true;
      } else if (callIndex >= start && callIndex < end && resultIndex >= end) {
        end = callIndex;
        changed = true;
      }
    }
  }

  if (start >= end) {
    return [...history];
  }
  return [...history.slice(0, start), ...history.slice(end)];
}

/** [assistant index, result index] for every result with an earlier call. */
function toolCallPairs(history: readonly ConversationTurn[]): Array<[number, number]> {
  const owner = new Map<string, number>();
  const pairs: Array<[number, number]> = [];

  history.forEach((turn, index) => {
    if (turn.role === "assistant") {
      for (const call of turn.toolCalls) {
        owner.set(call.id, index);
      }
    } else if (turn.role === "tool") {
      const callIndex = owner.get(turn.toolCallId);
      if (callIndex !== undefined) {
        pairs.push([callIndex, index]);
      }
    }
  });

  return pairs;
}
