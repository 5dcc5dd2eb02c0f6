import crypto from "node:crypto";
import { sanitizeHistory, textualizeHistory, truncateText } from "./historyReconciler.js";
import { LogContext, errorMessage, logger } from "./logger.js";
import { SessionStore, toolResultTurn } from "./sessionStore.js";
import { SYSTEM_PROMPT } from "./systemPrompt.js";
import { ResolvedCall, ToolCallAssembler } from "./toolCallAssembler.js";
import { ToolOutcome, ToolRegistry, failure } from "./toolRegistry.js";
import { TurnQueue } from "./turnQueue.js";
import {
  AssistantTurn,
  ConversationTurn,
  DecisionEvent,
  ModelProvider,
  ProgressEvent,
  ReplayTurn,
  ToolCallRequest,
  ToolResultTurn,
  TurnRequest,
  TurnResult,
} from "./types.js";

export interface ConductorServiceConfig {
  maxSessions: number;
  maxToolRounds: number;
  toolResultPreviewChars: number;
  systemPrompt?: string;
}

export type Emit = (event: ProgressEvent) => void;

export const COMPLETED_FALLBACK = "Task completed.";
export const ROUNDS_EXHAUSTED_FALLBACK =
  "I ran into an issue finishing that request: it needed more tool steps than allowed. Please try again with a narrower request.";
export const PROVIDER_FAILURE_FALLBACK =
  "Sorry, I couldn't reach the language model just now. Please try again in a moment.";
export const CANCELLED_FALLBACK = "The request was cancelled before it finished.";

const MAX_SEARCH_FAILURES = 2;

/** Counts failed searches per tool within one turn. */
export class SearchRetryGuard {
  private readonly failures = new Map<string, number>();
  private readonly limit: number;

  constructor(limit: number = MAX_SEARCH_FAILURES) {
    this.limit = limit;
  }

  blocked(toolName: string): boolean {
    return (this.failures.get(toolName) ?? 0) >= this.limit;
  }

  record(toolName: string, ok: boolean): void {
    if (!ok) {
      this.failures.set(toolName, (this.failures.get(toolName) ?? 0) + 1);
    }
  }
}

interface TurnContext {
  sessionId: string;
  log: LogContext;
  signal?: AbortSignal;
  forward: Emit;
  scratchpad: Array<AssistantTurn | ToolResultTurn>;
  dispatched: Set<string>;
  searches: SearchRetryGuard;
}

interface RoundOutcome {
  text: string;
  final?: string;
  ranTools: boolean;
}

export class ConductorService {
  readonly sessions: SessionStore;

  private readonly provider: ModelProvider;
  private readonly tools: ToolRegistry;
  private readonly config: ConductorServiceConfig;
  private readonly queue = new TurnQueue();

  constructor(provider: ModelProvider, tools: ToolRegistry, sessions: SessionStore, config: ConductorServiceConfig) {
    this.provider = provider;
    this.tools = tools;
    this.sessions = sessions;
    this.config = config;
  }

  /**
   * Runs one user turn. Turns of the same session queue behind each other.
   * Never rejects: failures surface as an `error` event and a fallback
   * reply, and `stream_end` is always the last event emitted.
   */
  async runTurn(request: TurnRequest, emit: Emit): Promise<TurnResult> {
    const { sessionId, text, signal } = request;
    const log: LogContext = { sessionId, turnId: crypto.randomUUID().slice(0, 8) };

    const send = (event: ProgressEvent): void => {
      try {
        emit(event);
      } catch (error) {
        logger.warn(`progress listener failed: ${errorMessage(error)}`, log);
      }
    };
    const forward: Emit = (event) => {
      if (!signal?.aborted) {
        send(event);
      }
    };

    forward({ type: "status", message: "Processing your request..." });

    const release = await this.queue.acquire(sessionId);
    this.sessions.pin(sessionId);

    let result: TurnResult = { output: CANCELLED_FALLBACK, status: "cancelled" };
    try {
      const before = this.sessions.getOrCreate(sessionId).history;
      const replay = textualizeHistory(sanitizeHistory(before), {
        maxResultChars: this.config.toolResultPreviewChars,
      });
      this.sessions.appendUser(sessionId, text);
      logger.info("turn started", log, { replayMessages: replay.length });

      const context: TurnContext = {
        sessionId,
        log,
        signal,
        forward,
        scratchpad: [],
        dispatched: new Set(),
        searches: new SearchRetryGuard(),
      };
      result = await this.decide(context, replay, text);
    } catch (error) {
      if (signal?.aborted) {
        result = { output: CANCELLED_FALLBACK, status: "cancelled" };
      } else {
        logger.error(`model provider failed: ${errorMessage(error)}`, log, { provider: this.provider.name });
        forward({ type: "error", message: PROVIDER_FAILURE_FALLBACK });
        result = { output: PROVIDER_FAILURE_FALLBACK, status: "aborted" };
      }
    } finally {
      this.sessions.appendAssistantText(sessionId, result.output);
      if (result.status === "finalized") {
        forward({ type: "final_output", data: { output: result.output } });
      }
      this.sessions.trim(sessionId);
      this.sessions.unpin(sessionId);
      release();
      this.sweepSessions();
      logger.info(`turn ${result.status}`, log);
      send({ type: "stream_end" });
    }

    return result;
  }

  /** Runs a turn without progress events and returns the reply. */
  async chat(sessionId: string, text: string): Promise<{ output: string }> {
    const result = await this.runTurn({ sessionId, text }, () => undefined);
    return { output: result.output };
  }

  /** Clears the session once any running turn for it has finished. */
  async reset(sessionId: string): Promise<{ found: boolean }> {
    return this.queue.run(sessionId, async () => ({ found: this.sessions.clear(sessionId) }));
  }

  history(sessionId: string): ConversationTurn[] | undefined {
    return this.sessions.snapshot(sessionId);
  }

  sweepSessions(): number {
    return this.sessions.evictExcess(this.config.maxSessions);
  }

  private async decide(context: TurnContext, replay: ReplayTurn[], input: string): Promise<TurnResult> {
    for (let round = 0; round < this.config.maxToolRounds; round++) {
      const mark = context.scratchpad.length;
      const outcome = await this.runRound(context, replay, input);
      if (outcome.ranTools) {
        this.keepRoundText(context, mark, outcome.text);
      }

      if (context.signal?.aborted) {
        return { output: CANCELLED_FALLBACK, status: "cancelled" };
      }
      if (outcome.final !== undefined) {
        return { output: outcome.final.trim() || COMPLETED_FALLBACK, status: "finalized" };
      }
      if (!outcome.ranTools) {
        return { output: outcome.text.trim() || COMPLETED_FALLBACK, status: "finalized" };
      }
      logger.debug(`round ${round + 1} ran tools, asking the model again`, context.log);
    }

    logger.warn(`no answer after ${this.config.maxToolRounds} rounds`, context.log);
    return { output: ROUNDS_EXHAUSTED_FALLBACK, status: "finalized" };
  }

  /** Attaches text streamed alongside tool calls to the round's first assistant turn. */
  private keepRoundText(context: TurnContext, from: number, text: string): void {
    const content = text.trim();
    const turn = context.scratchpad.slice(from).find((entry): entry is AssistantTurn => entry.role === "assistant");
    if (!content || !turn || turn.toolCalls.length === 0) {
      return;
    }
    turn.content = content;
    this.sessions.setToolCallText(context.sessionId, turn.toolCalls[0].id, content);
  }

  private async runRound(context: TurnContext, replay: ReplayTurn[], input: string): Promise<RoundOutcome> {
    const assembler = new ToolCallAssembler();
    const outcome: RoundOutcome = { text: "", ranTools: false };

    const dispatch = async (resolved: ResolvedCall | undefined): Promise<void> => {
      if (resolved) {
        await this.dispatch(context, resolved);
        outcome.ranTools = true;
      }
    };
    const flush = async (except?: string): Promise<void> => {
      for (const id of assembler.ids()) {
        if (id !== except && assembler.isDispatchable(id)) {
          await dispatch(assembler.resolve(id));
        }
      }
    };

    const stream = this.provider.streamResponse({
      system: this.config.systemPrompt ?? SYSTEM_PROMPT,
      history: replay,
      input,
      scratchpad: [...context.scratchpad],
      tools: this.tools.definitions(),
      signal: context.signal,
    });

    for await (const event of stream) {
      if (context.signal?.aborted) {
        return outcome;
      }
      await this.route(context, event, assembler, outcome, dispatch, flush);
    }

    if (context.signal?.aborted) {
      return outcome;
    }
    for (const id of assembler.ids()) {
      await dispatch(assembler.resolve(id));
    }
    return outcome;
  }

  private async route(
    context: TurnContext,
    event: DecisionEvent,
    assembler: ToolCallAssembler,
    outcome: RoundOutcome,
    dispatch: (resolved: ResolvedCall | undefined) => Promise<void>,
    flush: (except?: string) => Promise<void>,
  ): Promise<void> {
    switch (event.type) {
      case "text":
        await flush();
        outcome.text += event.text;
        context.forward({ type: "thinking_step", data: event.text });
        return;

      case "tool_call_fragment":
        if (context.dispatched.has(event.id)) {
          logger.debug("late fragment for a dispatched call ignored", { ...context.log, callId: event.id });
          return;
        }
        await flush(event.id);
        assembler.accept(event);
        if (event.final) {
          await dispatch(assembler.resolve(event.id));
        }
        return;

      case "tool_result": {
        const pending = assembler.has(event.toolCallId) ? assembler.resolve(event.toolCallId) : undefined;
        if (!pending) {
          logger.warn("orphan tool result ignored", { ...context.log, callId: event.toolCallId, tool: event.toolName });
          return;
        }
        const call = toRecordedCall(pending, event.toolName);
        this.recordCall(context, call);
        this.recordResult(context, call, { ok: true, text: event.content });
        return;
      }

      case "final":
        await flush();
        outcome.final = event.text;
        return;
    }
  }

  private async dispatch(context: TurnContext, resolved: ResolvedCall): Promise<void> {
    const call = toRecordedCall(resolved);
    this.recordCall(context, call);

    let outcome: ToolOutcome;
    if (resolved.status === "invalid") {
      logger.warn("tool call arguments never formed a JSON object", { ...context.log, callId: call.id, tool: call.name });
      const raw = truncateText(resolved.raw, 200);
      outcome = failure(`Could not run ${call.name}: its arguments were not a valid JSON object (${raw}).`);
    } else {
      outcome = await this.execute(context, call);
    }

    this.recordResult(context, call, outcome);
  }

  private async execute(context: TurnContext, call: ToolCallRequest): Promise<ToolOutcome> {
    const isSearch = this.tools.isSearch(call.name);
    if (isSearch && context.searches.blocked(call.name)) {
      logger.info("search retry limit reached", { ...context.log, callId: call.id, tool: call.name });
      return failure(`${call.name} has already failed ${MAX_SEARCH_FAILURES} times in this turn and was not run again. ` +
        "Tell the user what was tried and ask for a different title.");
    }

    const started = Date.now();
    const outcome = await this.tools.execute(call.name, call.input);
    if (isSearch) {
      context.searches.record(call.name, outcome.ok);
    }
    logger.info(`tool finished ok=${outcome.ok}`, { ...context.log, callId: call.id, tool: call.name }, {
      durationMs: Date.now() - started,
    });
    return outcome;
  }

  private recordCall(context: TurnContext, call: ToolCallRequest): void {
    context.dispatched.add(call.id);
    this.sessions.appendToolCall(context.sessionId, call);

    const last = context.scratchpad[context.scratchpad.length - 1];
    if (last?.role === "assistant") {
      last.toolCalls.push(call);
    } else {
      context.scratchpad.push({ role: "assistant", content: "", toolCalls: [call] });
    }

    context.forward({
      type: "tool_run",
      data: { tool_name: call.name, tool_input: call.input, tool_call_id: call.id },
    });
  }

  private recordResult(context: TurnContext, call: ToolCallRequest, outcome: ToolOutcome): void {
    this.sessions.appendToolResult(context.sessionId, call.name, outcome.text, call.id, !outcome.ok);
    context.scratchpad.push(toolResultTurn(call.name, call.id, outcome.text, !outcome.ok));
    context.forward({
      type: "tool_result",
      data: { tool_name: call.name, observation: outcome.text, tool_call_id: call.id },
    });
  }
}

function toRecordedCall(resolved: ResolvedCall, fallbackName = "unknown_tool"): ToolCallRequest {
  if (resolved.status === "ready") {
    return resolved.call;
  }
  return { id: resolved.id, name: resolved.name || fallbackName, input: {} };
}
