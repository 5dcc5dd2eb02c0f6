import crypto from "node:crypto";
import { isRecord } from "../core/json.js";
import { DecisionEvent, ModelProvider, ModelRequest } from "../core/types.js";
import { ProviderError, ensureOk, readLines } from "./streaming.js";

export interface OllamaConfig {
  host: string;
  model: string;
  timeoutMs?: number;
}

interface OllamaToolCall {
  function: { name: string; arguments: Record<string, unknown> };
}

interface OllamaMessage {
  role: "system" | "user" | "assistant" | "tool";
  content: string;
  tool_calls?: OllamaToolCall[];
  tool_name?: string;
}

/**
 * Ollama `/api/chat` with `stream: true`: one JSON object per line. Tool
 * calls arrive whole and without ids, so each one becomes a single final
 * fragment under a generated id.
 */
export class OllamaProvider implements ModelProvider {
  readonly name = "ollama";

  private readonly config: OllamaConfig;

  constructor(config: OllamaConfig) {
    this.config = config;
  }

  async *streamResponse(request: ModelRequest): AsyncIterable<DecisionEvent> {
    const timeout = AbortSignal.timeout(this.config.timeoutMs ?? 120_000);
    const response = await fetch(`${this.config.host.replace(/\/+$/, "")}/api/chat`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({
        model: this.config.model,
        stream: true,
        messages: toOllamaMessages(request),
        tools: request.tools.map((tool) => ({
          type: "function",
          function: { name: tool.name, description: tool.description, parameters: tool.input_schema },
        })),
      }),
      signal: request.signal ? AbortSignal.any([request.signal, timeout]) : timeout,
    });

    const body = await ensureOk(this.name, response);
    yield* mapOllamaLines(readLines(body));
  }
}

export function toOllamaMessages(request: ModelRequest): OllamaMessage[] {
  const messages: OllamaMessage[] = [{ role: "system", content: request.system }];

  for (const turn of request.history) {
    messages.push({ role: turn.role, content: turn.content });
  }
  messages.push({ role: "user", content: request.input });

  for (const turn of request.scratchpad) {
    if (turn.role === "tool") {
      messages.push({ role: "tool", content: turn.content, tool_name: turn.toolName });
      continue;
    }
    messages.push({
      role: "assistant",
      content: turn.content,
      tool_calls: turn.toolCalls.map((call) => ({ function: { name: call.name, arguments: call.input } })),
    });
  }

  return messages;
}

export async function* mapOllamaLines(lines: AsyncIterable<string>): AsyncIterable<DecisionEvent> {
  for await (const line of lines) {
    if (!line.trim()) {
      continue;
    }

    let chunk: unknown;
    try {
      chunk = JSON.parse(line);
    } catch {
      throw new ProviderError("ollama", `unreadable stream line: ${line.slice(0, 120)}`);
    }
    if (!isRecord(chunk)) {
      continue;
    }
    if (typeof chunk.error === "string") {
      throw new ProviderError("ollama", chunk.error);
    }

    const message = isRecord(chunk.message) ? chunk.message : undefined;
    if (message && typeof message.content === "string" && message.content) {
      yield { type: "text", text: message.content };
    }

    const calls = message && Array.isArray(message.tool_calls) ? message.tool_calls : [];
    for (const call of calls) {
      if (!isRecord(call) || !isRecord(call.function) || typeof call.function.name !== "string") {
        continue;
      }
      const args = call.function.arguments;
      yield {
        type: "tool_call_fragment",
        id: crypto.randomUUID(),
        name: call.function.name,
        argumentsText: typeof args === "string" ? args : JSON.stringify(isRecord(args) ? args : {}),
        final: true,
      };
    }
  }
}
