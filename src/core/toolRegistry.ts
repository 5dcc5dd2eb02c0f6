import { errorMessage, logger } from "./logger.js";
import { ToolDefinition } from "./types.js";

export type ToolOutcome = { ok: true; text: string } | { ok: false; text: string };

export type ToolCategory = "search" | "download" | "status";

export interface ToolSpec {
  definition: ToolDefinition;
  category: ToolCategory;
  run(input: Record<string, unknown>): Promise<ToolOutcome>;
}

export function success(text: string): ToolOutcome {
  return { ok: true, text };
}

export function failure(text: string): ToolOutcome {
  return { ok: false, text };
}

/**
 * Fixed set of named tools. `execute` always settles with text: a call that
 * throws still has to be answered, or the call/result pairing in the
 * conversation breaks.
 */
export class ToolRegistry {
  private readonly specs = new Map<string, ToolSpec>();

  constructor(specs: ToolSpec[]) {
    for (const spec of specs) {
      if (this.specs.has(spec.definition.name)) {
        throw new Error(`duplicate tool name: ${spec.definition.name}`);
      }
      this.specs.set(spec.definition.name, spec);
    }
  }

  definitions(): ToolDefinition[] {
    return [...this.specs.values()].map((spec) => spec.definition);
  }

  has(name: string): boolean {
    return this.specs.has(name);
  }

  isSearch(name: string): boolean {
    return this.specs.get(name)?.category === "search";
  }

  async execute(name: string, input: Record<string, unknown>): Promise<ToolOutcome> {
    const spec = this.specs.get(name);
    if (!spec) {
      logger.warn("model requested an unknown tool", { tool: name });
      return failure(`Unknown tool '${name}'. Available tools: ${[...this.specs.keys()].join(", ")}.`);
    }

    try {
      return await spec.run(input);
    } catch (error) {
      const message = errorMessage(error);
      logger.warn(`tool failed: ${message}`, { tool: name });
      return failure(`The ${name} tool failed: ${message}`);
    }
  }
}
