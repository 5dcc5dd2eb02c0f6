import { isRecord } from "../core/json.js";
import { DecisionEvent, ModelProvider, ModelRequest } from "../core/types.js";
import { ProviderError, ServerSentEvent, ensureOk, readLines, readServerSentEvents } from "./streaming.js";

export interface AnthropicConfig {
  apiKey: string;
  model: string;
  maxTokens: number;
  baseUrl?: string;
  timeoutMs?: number;
}

// ---------------------------------------------------------------------------
// Anthropic API wire types
// ---------------------------------------------------------------------------

interface AnthropicTextBlock {
  type: "text";
  text: string;
}

interface AnthropicToolUseBlock {
  type: "tool_use";
  id: string;
  name: string;
  input: Record<string, unknown>;
}

interface AnthropicToolResultBlock {
  type: "tool_result";
  tool_use_id: string;
  content: string;
  is_error?: boolean;
}

type AnthropicContentBlock = AnthropicTextBlock | AnthropicToolUseBlock | AnthropicToolResultBlock;

interface AnthropicMessage {
  role: "user" | "assistant";
  content: AnthropicContentBlock[];
}

// ---------------------------------------------------------------------------
// Provider implementation
// ---------------------------------------------------------------------------

export class AnthropicProvider implements ModelProvider {
  readonly name = "anthropic";

  private readonly config: AnthropicConfig;

  constructor(config: AnthropicConfig) {
    this.config = config;
  }

  async *streamResponse(request: ModelRequest): AsyncIterable<DecisionEvent> {
    const timeout = AbortSignal.timeout(this.config.timeoutMs ?? 60_000);
    const body: Record<string, unknown> = {
      model: this.config.model,
      max_tokens: this.config.maxTokens,
      stream: true,
      system: request.system,
      messages: toAnthropicMessages(request),
    };

    if (request.tools.length > 0) {
      body.tools = request.tools;
    }

    const response = await fetch(`${this.config.baseUrl ?? "https://api.anthropic.com"}/v1/messages`, {
      method: "POST",
      headers: {
        "content-type": "application/json",
        "x-api-key": this.config.apiKey,
        "anthropic-version": "2023-06-01",
      },
      body: JSON.stringify(body),
      signal: request.signal ? AbortSignal.any([request.signal, timeout]) : timeout,
    });

    const stream = await ensureOk(this.name, response);
    yield* mapAnthropicEvents(readServerSentEvents(readLines(stream)));
  }
}

/**
 * Builds the Messages API conversation. Tool results travel in a user
 * message (Anthropic convention) and consecutive same-role messages are
 * merged so roles keep alternating.
 */
export function toAnthropicMessages(request: ModelRequest): AnthropicMessage[] {
  const messages: AnthropicMessage[] = [];

  const push = (role: AnthropicMessage["role"], blocks: AnthropicContentBlock[]): void => {
    if (!blocks.length) {
      return;
    }
    const last = messages[messages.length - 1];
    if (last?.role === role) {
      last.content.push(...blocks);
      return;
    }
    messages.push({ role, content: blocks });
  };

  for (const turn of request.history) {
    push(turn.role, turn.content ? [{ type: "text", text: turn.content }] : []);
  }
  push("user", [{ type: "text", text: request.input }]);

  for (const turn of request.scratchpad) {
    if (turn.role === "tool") {
      const result: AnthropicToolResultBlock = { type: "tool_result", tool_use_id: turn.toolCallId, content: turn.content };
      if (turn.isError) {
        result.is_error = true;
      }
      push("user", [result]);
      continue;
    }
    const blocks: AnthropicContentBlock[] = turn.content ? [{ type: "text", text: turn.content }] : [];
    for (const call of turn.toolCalls) {
      blocks.push({ type: "tool_use", id: call.id, name: call.name, input: call.input });
    }
    push("assistant", blocks);
  }

  return messages;
}

/**
 * Maps streaming events to decision events. Tool input arrives as
 * `input_json_delta` pieces keyed by content block index; the block's stop
 * closes the call.
 */
export async function* mapAnthropicEvents(events: AsyncIterable<ServerSentEvent>): AsyncIterable<DecisionEvent> {
  const toolBlocks = new Map<number, string>();

  for await (const { event, data } of events) {
    if (event === "ping") {
      continue;
    }

    let payload: unknown;
    try {
      payload = JSON.parse(data);
    } catch {
      throw new ProviderError("anthropic", `unreadable ${event} event`);
    }
    if (!isRecord(payload)) {
      continue;
    }

    const index = typeof payload.index === "number" ? payload.index : -1;

    switch (payload.type) {
      case "content_block_start": {
        const block = payload.content_block;
        if (isRecord(block) && block.type === "tool_use" && typeof block.id === "string") {
          toolBlocks.set(index, block.id);
          yield {
            type: "tool_call_fragment",
            id: block.id,
            name: typeof block.name === "string" ? block.name : undefined,
            argumentsText: "",
          };
        }
        break;
      }

      case "content_block_delta": {
        const delta = payload.delta;
        if (!isRecord(delta)) {
          break;
        }
        if (delta.type === "text_delta" && typeof delta.text === "string" && delta.text) {
          yield { type: "text", text: delta.text };
        }
        const id = toolBlocks.get(index);
        if (delta.type === "input_json_delta" && id && typeof delta.partial_json === "string") {
          yield { type: "tool_call_fragment", id, argumentsText: delta.partial_json };
        }
        break;
      }

      case "content_block_stop": {
        const id = toolBlocks.get(index);
        if (id) {
          toolBlocks.delete(index);
          yield { type: "tool_call_fragment", id, argumentsText: "", final: true };
        }
        break;
      }

      case "error": {
        const detail = isRecord(payload.error) && typeof payload.error.message === "string"
          ? payload.error.message
          : "stream error";
        throw new ProviderError("anthropic", detail);
      }

      default:
        break;
    }
  }
}
