import {
  BedrockRuntimeClient,
  ConverseStreamCommand,
  type ContentBlock,
  type ConverseStreamCommandInput,
  type ConverseStreamOutput,
  type Message,
  type ToolConfiguration,
  type ToolUseBlock,
} from "@aws-sdk/client-bedrock-runtime";
import { isRecord } from "../core/json.js";
import { logger } from "../core/logger.js";
import { DecisionEvent, ModelProvider, ModelRequest, ToolDefinition } from "../core/types.js";
import { ProviderError } from "./streaming.js";

export interface BedrockConfig {
  modelId: string;
  region: string;
  maxTokens?: number;
  client?: BedrockRuntimeClient;
}

type Document = Exclude<ToolUseBlock["input"], undefined>;

/** Amazon Bedrock ConverseStream with native tool use. */
export class BedrockProvider implements ModelProvider {
  readonly name = "bedrock";

  private readonly config: BedrockConfig;
  private readonly client: BedrockRuntimeClient;

  constructor(config: BedrockConfig) {
    this.config = config;
    this.client = config.client ?? new BedrockRuntimeClient({ region: config.region });
  }

  async *streamResponse(request: ModelRequest): AsyncIterable<DecisionEvent> {
    const input: ConverseStreamCommandInput = {
      modelId: this.config.modelId,
      system: [{ text: request.system }],
      messages: toBedrockMessages(request),
      inferenceConfig: {
        maxTokens: this.config.maxTokens ?? 2048,
        temperature: 0.2,
      },
    };
    if (request.tools.length > 0) {
      input.toolConfig = toToolConfig(request.tools);
    }

    logger.debug("calling Bedrock ConverseStream", undefined, {
      modelId: this.config.modelId,
      messageCount: input.messages?.length ?? 0,
    });

    const response = await this.client.send(new ConverseStreamCommand(input), { abortSignal: request.signal });
    if (!response.stream) {
      throw new ProviderError(this.name, "No stream in Bedrock response");
    }

    yield* mapConverseStream(response.stream);
  }
}

export function toToolConfig(tools: ToolDefinition[]): ToolConfiguration {
  return {
    tools: tools.map((tool) => ({
      toolSpec: {
        name: tool.name,
        description: tool.description,
        inputSchema: { json: toDocument(tool.input_schema) },
      },
    })),
  };
}

export function toBedrockMessages(request: ModelRequest): Message[] {
  const messages: Message[] = [];

  const push = (role: "user" | "assistant", blocks: ContentBlock[]): void => {
    if (!blocks.length) {
      return;
    }
    const last = messages[messages.length - 1];
    if (last?.role === role && last.content) {
      last.content.push(...blocks);
      return;
    }
    messages.push({ role, content: blocks });
  };

  for (const turn of request.history) {
    push(turn.role, turn.content ? [{ text: turn.content }] : []);
  }
  push("user", [{ text: request.input }]);

  for (const turn of request.scratchpad) {
    if (turn.role === "tool") {
      const status = turn.isError ? "error" : "success";
      push("user", [{ toolResult: { toolUseId: turn.toolCallId, content: [{ text: turn.content }], status } }]);
      continue;
    }
    const blocks: ContentBlock[] = turn.content ? [{ text: turn.content }] : [];
    for (const call of turn.toolCalls) {
      blocks.push({ toolUse: { toolUseId: call.id, name: call.name, input: toDocument(call.input) } });
    }
    push("assistant", blocks);
  }

  return messages;
}

/**
 * Tool input arrives as string pieces between contentBlockStart and
 * contentBlockStop; both ends become fragments so the caller can merge them.
 */
export async function* mapConverseStream(stream: AsyncIterable<ConverseStreamOutput>): AsyncIterable<DecisionEvent> {
  let currentToolUseId = "";

  for await (const chunk of stream) {
    const toolStart = chunk.contentBlockStart?.start?.toolUse;
    if (toolStart?.toolUseId) {
      currentToolUseId = toolStart.toolUseId;
      yield { type: "tool_call_fragment", id: currentToolUseId, name: toolStart.name, argumentsText: "" };
    }

    const delta = chunk.contentBlockDelta?.delta;
    if (delta?.text) {
      yield { type: "text", text: delta.text };
    }
    if (delta?.toolUse?.input && currentToolUseId) {
      yield { type: "tool_call_fragment", id: currentToolUseId, argumentsText: delta.toolUse.input };
    }

    if (chunk.contentBlockStop !== undefined && currentToolUseId) {
      yield { type: "tool_call_fragment", id: currentToolUseId, argumentsText: "", final: true };
      currentToolUseId = "";
    }

    const failure =
      chunk.internalServerException ??
      chunk.modelStreamErrorException ??
      chunk.validationException ??
      chunk.throttlingException;
    if (failure) {
      throw new ProviderError("bedrock", failure.message ?? "Bedrock stream failed");
    }
  }
}

export function toDocument(value: unknown): Document {
  if (value === null || typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(toDocument);
  }
  if (isRecord(value)) {
    const document: Record<string, Document> = {};
    for (const [key, entry] of Object.entries(value)) {
      if (entry !== undefined) {
        document[key] = toDocument(entry);
      }
    }
    return document;
  }
  return null;
}
