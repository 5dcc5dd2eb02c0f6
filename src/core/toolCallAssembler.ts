import { parseObject } from "./json.js";
import { ToolCallFragment, ToolCallRequest } from "./types.js";

interface PendingCall {
  id: string;
  name: string;
  raw: string;
  parsed?: Record<string, unknown>;
}

export type ResolvedCall =
  | { status: "ready"; call: ToolCallRequest }
  | { status: "invalid"; id: string; name: string; raw: string };

/**
 * Reassembles streamed tool-call fragments. Providers disagree on what a
 * fragment holds: some send deltas to append, some re-send the whole
 * argument object, some re-send an overlapping tail. Each fragment is tried
 * in that order of preference: whole object, plain continuation, overlapping
 * continuation.
 */
export class ToolCallAssembler {
  private readonly pending = new Map<string, PendingCall>();

  accept(fragment: ToolCallFragment): void {
    const existing = this.pending.get(fragment.id);
    const current: PendingCall = existing ?? { id: fragment.id, name: "", raw: "" };

    if (fragment.name) {
      current.name = fragment.name;
    }

    const merged = mergeArgumentText(current.raw, fragment.argumentsText);
    current.raw = merged.raw;
    if (merged.parsed) {
      current.parsed = merged.parsed;
    } else if (fragment.argumentsText) {
      current.parsed = undefined;
    }

    this.pending.set(fragment.id, current);
  }

  has(id: string): boolean {
    return this.pending.has(id);
  }

  ids(): string[] {
    return [...this.pending.keys()];
  }

  /** True when the call has a name and its arguments form a complete object. */
  isDispatchable(id: string): boolean {
    const call = this.pending.get(id);
    return Boolean(call && call.name && (call.parsed || !call.raw.trim()));
  }

  /**
   * Removes the call and reports whether it can be dispatched. Empty
   * argument text resolves to `{}`.
   */
  resolve(id: string): ResolvedCall | undefined {
    const call = this.pending.get(id);
    if (!call) {
      return undefined;
    }
    this.pending.delete(id);

    if (call.name && call.parsed) {
      return { status: "ready", call: { id: call.id, name: call.name, input: call.parsed } };
    }
    if (call.name && !call.raw.trim()) {
      return { status: "ready", call: { id: call.id, name: call.name, input: {} } };
    }
    return { status: "invalid", id: call.id, name: call.name, raw: call.raw };
  }
}

export function mergeArgumentText(
  accumulated: string,
  fragment: string,
): { raw: string; parsed?: Record<string, unknown> } {
  if (!fragment) {
    return { raw: accumulated, parsed: parseObject(accumulated) };
  }

  const whole = parseObject(fragment);
  if (whole) {
    return { raw: fragment, parsed: whole };
  }

  const appended = accumulated + fragment;
  const continued = parseObject(appended);
  if (continued) {
    return { raw: appended, parsed: continued };
  }

  const overlap = overlapLength(accumulated, fragment);
  if (overlap > 0) {
    const spliced = accumulated + fragment.slice(overlap);
    const parsed = parseObject(spliced);
    if (parsed) {
      return { raw: spliced, parsed };
    }
  }

  return { raw: appended };
}

/** Longest prefix of `fragment` that `accumulated` already ends with. */
function overlapLength(accumulated: string, fragment: string): number {
  const max = Math.min(accumulated.length, fragment.length);
  for (let size = max; size > 0; size--) {
    if (accumulated.endsWith(fragment.slice(0, size))) {
      return size;
    }
  }
  return 0;
}
