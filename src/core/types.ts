export interface EventEnvelope {
  id: string;
  type: string;
  timestamp: string;
  sessionId: string;
  payload: Record<string, unknown>;
}

export interface ToolDefinition {
  name: string;
  description: string;
  input_schema: {
    type: "object";
    properties: Record<string, unknown>;
    required?: string[];
  };
}

export interface ToolCallRequest {
  id: string;
  name: string;
  input: Record<string, unknown>;
}

// ---------------------------------------------------------------------------
// Conversation log
// ---------------------------------------------------------------------------

export interface UserTurn {
  role: "user";
  content: string;
}

export interface AssistantTurn {
  role: "assistant";
  content: string;
  toolCalls: ToolCallRequest[];
}

export interface ToolResultTurn {
  role: "tool";
  toolName: string;
  toolCallId: string;
  content: string;
  /** Present when the call failed, was refused or never ran. */
  isError?: true;
}

export type ConversationTurn = UserTurn | AssistantTurn | ToolResultTurn;

/** History as replayed to the model: tool traffic folded into assistant text. */
export type ReplayTurn = UserTurn | AssistantTurn;

export interface ConversationLog {
  sessionId: string;
  history: ConversationTurn[];
  maxMessages: number;
  createdAt: number;
  lastAccessAt: number;
}

// ---------------------------------------------------------------------------
// Model capability
// ---------------------------------------------------------------------------

export interface TextDecision {
  type: "text";
  text: string;
}

/**
 * A piece of a tool call. `argumentsText` is raw JSON text which may be a
 * partial object; `final` marks that the provider closed the call.
 */
export interface ToolCallFragment {
  type: "tool_call_fragment";
  id: string;
  name?: string;
  argumentsText: string;
  final?: boolean;
}

/** A result for a call the model capability executed on its own. */
export interface ToolResultDecision {
  type: "tool_result";
  toolCallId: string;
  toolName: string;
  content: string;
}

export interface FinalDecision {
  type: "final";
  text: string;
}

export type DecisionEvent = TextDecision | ToolCallFragment | ToolResultDecision | FinalDecision;

export interface ModelRequest {
  system: string;
  history: ReplayTurn[];
  input: string;
  /** Tool calls and results already produced during the current turn. */
  scratchpad: Array<AssistantTurn | ToolResultTurn>;
  tools: ToolDefinition[];
  signal?: AbortSignal;
}

export interface ModelProvider {
  readonly name: string;
  streamResponse(request: ModelRequest): AsyncIterable<DecisionEvent>;
}

// ---------------------------------------------------------------------------
// Turn progress (wire format shared by SSE, WebSocket and CLI)
// ---------------------------------------------------------------------------

export type ProgressEvent =
  | { type: "status"; message: string }
  | { type: "thinking_step"; data: string }
  | {
    type: "tool_run";
    data: { tool_name: string; tool_input: Record<string, unknown>; tool_call_id: string };
  }
  | {
    type: "tool_result";
    data: { tool_name: string; observation: string; tool_call_id: string };
  }
  | { type: "final_output"; data: { output: string } }
  | { type: "error"; message: string }
  | { type: "stream_end" };

export interface TurnRequest {
  sessionId: string;
  text: string;
  signal?: AbortSignal;
}

export interface TurnResult {
  output: string;
  status: "finalized" | "aborted" | "cancelled";
}
