/**
 * Minimal MCP server on stdio, spawned by the session tests.
 */
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";

const server = new McpServer({ name: "echo-fixture", version: "1.0.0" });

server.tool("echo", "Echo the text back", { text: z.string() }, async ({ text }) => ({
  content: [{ type: "text", text: `echo: ${text}` }],
}));

server.tool("refuse", "Always reports an error", async () => ({
  content: [{ type: "text", text: "refused" }],
  isError: true,
}));

console.error("echo fixture ready");
await server.connect(new StdioServerTransport());
