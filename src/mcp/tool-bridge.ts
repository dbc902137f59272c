/**
 * Exposes the tools of a connected MCP client through a ToolRegistry.
 */
import { Logger, type DiagnosticSink } from "../logger.js";
import { tetherError } from "../errors.js";
import type { ToolRegistry } from "../tools/tool-registry.js";

/** The part of the SDK Client the bridge uses. */
export interface ToolProvider {
  listTools(): Promise<{ tools: Array<{ name: string; description?: string; inputSchema: unknown }> }>;
  callTool(
    params: { name: string; arguments?: Record<string, unknown> },
    resultSchema?: unknown,
    options?: { signal?: AbortSignal },
  ): Promise<unknown>;
}

export interface BridgeOptions {
  serverName: string;
  logger?: DiagnosticSink;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/** Flatten a tools/call result to text: text parts verbatim, anything else as JSON. */
export function renderToolResult(result: unknown): { text: string; isError: boolean } {
  if (!isRecord(result)) return { text: JSON.stringify(result), isError: false };
  const isError = result.isError === true;
  if (Array.isArray(result.content)) {
    const text = result.content
      .map((c: unknown) => (isRecord(c) && c.type === "text" && typeof c.text === "string" ? c.text : JSON.stringify(c)))
      .join("\n");
    return { text, isError };
  }
  if ("toolResult" in result) return { text: JSON.stringify(result.toolResult), isError };
  return { text: JSON.stringify(result), isError };
}

/**
 * List the client's tools and register each one. Returns the registered
 * names. A name that is already taken is skipped with a warning.
 */
export async function registerServerTools(
  registry: ToolRegistry,
  client: ToolProvider,
  opts: BridgeOptions,
): Promise<string[]> {
  const logger: DiagnosticSink = opts.logger ?? Logger;
  const listed = await client.listTools();
  const registered: string[] = [];

  for (const tool of listed.tools) {
    if (registry.has(tool.name)) {
      logger.warn(`MCP "${opts.serverName}": tool "${tool.name}" already registered, skipping`);
      continue;
    }
    registry.register({
      name: tool.name,
      description: tool.description ?? "",
      parameters: isRecord(tool.inputSchema) ? tool.inputSchema : undefined,
      invoke: async (args, ctx) => {
        const result = await client.callTool({ name: tool.name, arguments: args }, undefined, { signal: ctx.signal });
        const { text, isError } = renderToolResult(result);
        if (isError) {
          throw tetherError("tool_error", `MCP tool "${tool.name}" (server: ${opts.serverName}) failed: ${text}`);
        }
        return text;
      },
    });
    registered.push(tool.name);
  }

  logger.debug?.(`MCP "${opts.serverName}": ${registered.length} tool(s) available`);
  return registered;
}
