/**
 * Streaming OpenAI-compatible model backend.
 * Works with OpenAI, LM Studio, Ollama and anything else that speaks
 * /v1/chat/completions with server-sent events.
 */
import { Logger } from "../logger.js";
import { asError } from "../errors.js";
import { timedFetch } from "../utils/timed-fetch.js";
import type { ChatMessage, ModelBackend, StreamEvent, StreamOptions, ToolCallRequest, ToolDefinition } from "./types.js";

export interface OpenAiBackendConfig {
  baseUrl: string;
  model: string;
  /** Passed explicitly; the backend never reads the environment. */
  apiKey?: string;
  /** Time allowed until response headers arrive. */
  timeoutMs?: number;
}

type WireMessage = Record<string, unknown>;

interface PendingCall {
  id: string;
  name: string;
  arguments: string;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function toWireTool(t: ToolDefinition): WireMessage {
  return {
    type: "function",
    function: { name: t.name, description: t.description, parameters: t.parameters },
  };
}

/**
 * Convert a transcript to wire messages. Tool results are moved right behind
 * the assistant message that requested them, since the API insists on that
 * pairing; a tool result nobody asked for gets a placeholder assistant call.
 */
export function toWireMessages(messages: readonly ChatMessage[]): WireMessage[] {
  const results = new Map<string, Extract<ChatMessage, { role: "tool" }>>();
  const requested = new Set<string>();
  for (const m of messages) {
    if (m.role === "tool") results.set(m.toolCallId, m);
    if (m.role === "assistant") for (const c of m.toolCalls ?? []) requested.add(c.id);
  }

  const wire: WireMessage[] = [];
  for (const m of messages) {
    switch (m.role) {
      case "system":
      case "user":
        wire.push({ role: m.role, content: m.content });
        break;
      case "assistant": {
        const calls = m.toolCalls ?? [];
        if (calls.length === 0) {
          wire.push({ role: "assistant", content: m.content });
          break;
        }
        wire.push({
          role: "assistant",
          content: m.content || null,
          tool_calls: calls.map((c) => ({
            id: c.id,
            type: "function",
            function: { name: c.name, arguments: JSON.stringify(c.arguments) },
          })),
        });
        for (const c of calls) {
          wire.push({
            role: "tool",
            tool_call_id: c.id,
            name: c.name,
            content: results.get(c.id)?.content ?? "[tool result missing]",
          });
        }
        break;
      }
      case "tool":
        if (requested.has(m.toolCallId)) break;
        wire.push({
          role: "assistant",
          content: null,
          tool_calls: [{ id: m.toolCallId, type: "function", function: { name: m.name, arguments: "{}" } }],
        });
        wire.push({ role: "tool", tool_call_id: m.toolCallId, name: m.name, content: m.content });
        break;
    }
  }
  return wire;
}

function parseArguments(name: string, raw: string): Record<string, unknown> {
  if (!raw.trim()) return {};
  try {
    const parsed: unknown = JSON.parse(raw);
    return isRecord(parsed) ? parsed : {};
  } catch (e: unknown) {
    Logger.debug(`Failed to parse args for ${name}: ${asError(e).message}, using empty args`);
    return {};
  }
}

export function makeStreamingOpenAiBackend(cfg: OpenAiBackendConfig): ModelBackend {
  const base = cfg.baseUrl.replace(/\/+$/, "");
  const endpoint = `${base}/v1/chat/completions`;
  const timeoutMs = cfg.timeoutMs ?? 10 * 60 * 1000;

  async function* stream(messages: readonly ChatMessage[], opts: StreamOptions): AsyncGenerator<StreamEvent> {
    const payload: Record<string, unknown> = {
      model: opts.model ?? cfg.model,
      messages: toWireMessages(messages),
      stream: true,
    };
    if (opts.tools.length > 0) {
      payload.tools = opts.tools.map(toWireTool);
      payload.tool_choice = "auto";
    }

    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (cfg.apiKey) headers["Authorization"] = `Bearer ${cfg.apiKey}`;

    const body = JSON.stringify(payload);
    Logger.debug(`[API →] ${body.length} bytes (${messages.length} messages)`);

    const res = await timedFetch(endpoint, {
      method: "POST",
      headers,
      body,
      signal: opts.signal,
      where: "backend:openai:stream",
      timeoutMs,
    });

    if (!res.ok) {
      const text = await res.text().catch(() => "");
      throw new Error(`OpenAI chat (stream) failed (${res.status}): ${text}`);
    }

    let index = 0;
    const toolByIndex = new Map<number, PendingCall>();

    function* fromDelta(delta: unknown): Generator<StreamEvent> {
      if (!isRecord(delta)) return;
      if (typeof delta.content === "string" && delta.content.length > 0) {
        yield { type: "fragment", index: index++, delta: delta.content };
      }
      if (!Array.isArray(delta.tool_calls)) return;
      for (const item of delta.tool_calls) {
        if (!isRecord(item)) continue;
        const idx = typeof item.index === "number" ? item.index : 0;
        const prev = toolByIndex.get(idx) ?? { id: "", name: "", arguments: "" };
        if (typeof item.id === "string" && item.id) prev.id = item.id;
        const f: Record<string, unknown> = isRecord(item.function) ? item.function : {};
        if (typeof f.name === "string") prev.name += f.name;
        if (typeof f.arguments === "string") prev.arguments += f.arguments;
        toolByIndex.set(idx, prev);
      }
    }

    function* fromEvent(rawEvent: string): Generator<StreamEvent> {
      const joined = rawEvent
        .split("\n")
        .map((l) => l.trim())
        .filter((l) => l.startsWith("data:"))
        .map((l) => l.replace(/^data:\s?/, ""))
        .join("\n")
        .trim();
      if (!joined || joined === "[DONE]") return;

      let parsed: unknown;
      try {
        parsed = JSON.parse(joined);
      } catch {
        Logger.debug("skipping undecodable SSE event", joined.slice(0, 120));
        return;
      }
      if (!isRecord(parsed) || !Array.isArray(parsed.choices)) return;
      const choice: unknown = parsed.choices[0];
      if (isRecord(choice)) yield* fromDelta(choice.delta);
    }

    const ct = (res.headers.get("content-type") || "").toLowerCase();
    if (!ct.includes("text/event-stream")) {
      const data: unknown = await res.json();
      const choice: unknown = isRecord(data) && Array.isArray(data.choices) ? data.choices[0] : undefined;
      if (isRecord(choice)) yield* fromDelta(choice.message);
    } else if (res.body) {
      const decoder = new TextDecoder("utf-8");
      const reader = res.body.getReader();
      let buf = "";
      try {
        for (;;) {
          const { value, done } = await reader.read();
          if (done) break;
          buf += decoder.decode(value, { stream: true });
          let sepIdx: number;
          while ((sepIdx = buf.indexOf("\n\n")) !== -1) {
            const rawEvent = buf.slice(0, sepIdx).trim();
            buf = buf.slice(sepIdx + 2);
            if (rawEvent) yield* fromEvent(rawEvent);
          }
        }
        if (buf.trim()) yield* fromEvent(buf.trim());
      } finally {
        reader.cancel().catch((e: unknown) => Logger.debug(`stream cancel: ${asError(e).message}`));
      }
    }

    const calls: ToolCallRequest[] = Array.from(toolByIndex.entries())
      .sort((a, b) => a[0] - b[0])
      .map(([idx, c]) => ({ id: c.id || `call_${idx}`, name: c.name, arguments: parseArguments(c.name, c.arguments) }));
    for (const call of calls) yield { type: "tool_call", call };

    Logger.debug(`[API ←] ${index} fragment(s), ${calls.length} tool call(s)`);
  }

  return { stream };
}
