/**
 * Tool registry: maps tool names to invocation capabilities.
 *
 * Instances are passed to whoever needs them; there is no process-wide
 * singleton.
 */
import { asError, isTetherError, tetherError } from "../errors.js";
import type { ToolDefinition } from "../drivers/types.js";

export interface ToolInvocationContext {
  signal?: AbortSignal;
}

export interface ToolDescriptor {
  /** Tool name (unique within a registry). */
  name: string;
  description: string;
  /** JSON schema for the argument object. */
  parameters?: Record<string, unknown>;
  /** Execute the tool. Returns the result string. */
  invoke: (args: Record<string, unknown>, ctx: ToolInvocationContext) => string | Promise<string>;
}

const EMPTY_PARAMETERS: Record<string, unknown> = { type: "object", properties: {} };

export class ToolRegistry {
  private tools = new Map<string, ToolDescriptor>();

  constructor(tools: ToolDescriptor[] = []) {
    for (const tool of tools) this.register(tool);
  }

  /** Register a tool. Throws if the name is already taken. */
  register(tool: ToolDescriptor): void {
    if (!tool.name) {
      throw tetherError("config_error", "Tool name must not be empty");
    }
    if (this.tools.has(tool.name)) {
      throw tetherError("config_error", `Tool '${tool.name}' is already registered.`);
    }
    this.tools.set(tool.name, tool);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get(name: string): ToolDescriptor | undefined {
    return this.tools.get(name);
  }

  get size(): number {
    return this.tools.size;
  }

  list(): ToolDescriptor[] {
    return Array.from(this.tools.values());
  }

  /** Definitions to advertise to the model, in registration order. */
  definitions(): ToolDefinition[] {
    return this.list().map((t) => ({
      name: t.name,
      description: t.description,
      parameters: t.parameters ?? EMPTY_PARAMETERS,
    }));
  }

  /**
   * Invoke a tool by name. Unknown tools and failing tools both reject with
   * a `tool_error`.
   */
  async invoke(name: string, args: Record<string, unknown>, ctx: ToolInvocationContext = {}): Promise<string> {
    const tool = this.tools.get(name);
    if (!tool) {
      throw tetherError("tool_error", `Unknown tool "${name}"`);
    }
    try {
      return await tool.invoke(args, ctx);
    } catch (e: unknown) {
      if (isTetherError(e) && e.kind === "tool_error") throw e;
      throw tetherError("tool_error", `Tool "${name}" failed: ${asError(e).message}`, { cause: e });
    }
  }
}
