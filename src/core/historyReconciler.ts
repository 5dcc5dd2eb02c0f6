import { AssistantTurn, ConversationTurn, ReplayTurn, ToolCallRequest } from "./types.js";

export const TOOL_ACTIONS_HEADER = "--- Previous tool actions ---";
export const NO_RESULT_PLACEHOLDER = "(no result)";
export const ELLIPSIS = "...";

export const DEFAULT_MAX_RESULT_CHARS = 800;
export const DEFAULT_MAX_ARGS_CHARS = 200;

export interface TextualizeOptions {
  maxResultChars?: number;
  maxArgsChars?: number;
}

/**
 * Last-write-wins merge of two records for the same call id: the incoming
 * input replaces the existing one, the name survives from whichever side
 * has one.
 */
export function mergeToolCall(existing: ToolCallRequest, incoming: ToolCallRequest): ToolCallRequest {
  return {
    id: existing.id,
    name: incoming.name || existing.name,
    input: { ...incoming.input },
  };
}

/** Collapses duplicate ids, keeping the position of the first occurrence. */
export function dedupeToolCalls(calls: ToolCallRequest[]): ToolCallRequest[] {
  const merged = new Map<string, ToolCallRequest>();
  for (const call of calls) {
    const existing = merged.get(call.id);
    merged.set(call.id, existing ? mergeToolCall(existing, call) : { ...call, input: { ...call.input } });
  }
  return [...merged.values()];
}

/**
 * Returns a copy of the history where every assistant message carries each
 * tool call id once. Idempotent; the input is left untouched.
 */
export function sanitizeHistory(history: readonly ConversationTurn[]): ConversationTurn[] {
  return history.map((turn): ConversationTurn => {
    switch (turn.role) {
      case "assistant":
        return { role: "assistant", content: turn.content, toolCalls: dedupeToolCalls(turn.toolCalls) };
      case "user":
        return { ...turn };
      case "tool":
        return { ...turn };
    }
  });
}

/**
 * Folds tool calls and their results into narrative assistant text so the
 * model sees what already happened without being offered the calls again.
 * Every run of assistant/tool messages between two user messages becomes a
 * single assistant message.
 */
export function textualizeHistory(
  history: readonly ConversationTurn[],
  options: TextualizeOptions = {},
): ReplayTurn[] {
  const maxResultChars = options.maxResultChars ?? DEFAULT_MAX_RESULT_CHARS;
  const maxArgsChars = options.maxArgsChars ?? DEFAULT_MAX_ARGS_CHARS;

  const replay: ReplayTurn[] = [];
  let texts: string[] = [];
  let blocks: string[] = [];

  const flush = (): void => {
    if (!texts.length && !blocks.length) {
      return;
    }

    let content = texts.join("\n\n");
    if (blocks.length) {
      const section = `${TOOL_ACTIONS_HEADER}\n${blocks.join("\n")}`;
      content = content ? `${content}\n\n${section}` : section;
    }

    replay.push({ role: "assistant", content, toolCalls: [] });
    texts = [];
    blocks = [];
  };

  for (let index = 0; index < history.length; index++) {
    const turn = history[index];
    switch (turn.role) {
      case "user":
        flush();
        replay.push({ role: "user", content: turn.content });
        break;

      case "assistant":
        if (turn.content.trim()) {
          texts.push(turn.content);
        }
        if (turn.toolCalls.length) {
          blocks.push(...renderToolBlocks(turn, history, index, maxArgsChars, maxResultChars));
        }
        break;

      case "tool":
        // Rendered alongside the call that produced it; orphans are dropped.
        break;
    }
  }

  flush();
  return replay;
}

function renderToolBlocks(
  turn: AssistantTurn,
  history: readonly ConversationTurn[],
  index: number,
  maxArgsChars: number,
  maxResultChars: number,
): string[] {
  const calls = dedupeToolCalls(turn.toolCalls);
  const ids = new Set(calls.map((call) => call.id));
  const results = new Map<string, string>();

  for (let cursor = index + 1; cursor < history.length; cursor++) {
    const next = history[cursor];
    if (next.role !== "tool") {
      break;
    }
    if (ids.has(next.toolCallId) && !results.has(next.toolCallId)) {
      results.set(next.toolCallId, next.content);
    }
  }

  return calls.map((call) => {
    const args = truncateText(formatArguments(call.input), maxArgsChars);
    const result = results.get(call.id);
    const rendered = result === undefined ? NO_RESULT_PLACEHOLDER : truncateText(result, maxResultChars);
    return `[Tool] ${call.name} args=${args}\n[Result] ${rendered}`;
  });
}

/**
 * Cuts `text` to at most `maxChars` UTF-16 units and appends the ellipsis
 * marker. A high surrogate left dangling at the cut is dropped.
 */
export function truncateText(text: string, maxChars: number): string {
  if (text.length <= maxChars) {
    return text;
  }

  let cut = text.slice(0, Math.max(0, maxChars));
  const last = cut.charCodeAt(cut.length - 1);
  if (last >= 0xd800 && last <= 0xdbff) {
    cut = cut.slice(0, -1);
  }
  return `${cut}${ELLIPSIS}`;
}

/** Compact literal notation for tool arguments, e.g. `{'query': 'X'}`. */
export function formatArguments(value: unknown): string {
  if (value === null || value === undefined) {
    return "null";
  }
  if (typeof value === "string") {
    return `'${value.replace(/\\/g, "\\\\").replace(/'/g, "\\'").replace(/\n/g, "\\n")}'`;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  if (Array.isArray(value)) {
    return `[${value.map(formatArguments).join(", ")}]`;
  }
  if (typeof value === "object") {
    const entries = Object.entries(value)
      .filter(([, entry]) => entry !== undefined)
      .map(([key, entry]) => `${formatArguments(key)}: ${formatArguments(entry)}`);
    return `{${entries.join(", ")}}`;
  }
  return String(value);
}
