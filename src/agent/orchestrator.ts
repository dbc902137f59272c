/**
 * AgentOrchestrator: drives one conversational exchange per chat() call.
 *
 * Fragments are folded into an accumulator strictly in sequence order; a
 * fragment whose index is not the next expected one is rejected as a
 * stream_error rather than reordered. Tool calls are run as soon as the
 * backend announces them and their results land in the transcript before the
 * next fragment is read.
 */
import type { DiagnosticSink } from "../logger.js";
import { asError, errorLogFields, isCancelled, isTetherError, tetherError, type TetherError } from "../errors.js";
import type { ModelBackend, StreamEvent, ToolCallRequest } from "../drivers/types.js";
import type { ToolRegistry } from "../tools/tool-registry.js";
import { Transcript } from "./transcript.js";

export const DEFAULT_SYSTEM_PROMPT = "You are a helpful assistant. Use the available tools when they help answer the user.";

export interface OrchestratorConfig {
  backend: ModelBackend;
  tools: ToolRegistry;
  model?: string;
  systemPrompt?: string;
  /** Stream rounds per chat; a further round only opens after tool calls. Default 1. */
  maxRounds?: number;
  logger?: DiagnosticSink;
}

export interface ChatOptions {
  signal?: AbortSignal;
  maxRounds?: number;
  model?: string;
  /** Called with each accepted fragment, in order. */
  onFragment?: (delta: string) => void;
  onToolResult?: (call: ToolCallRequest, content: string, isError: boolean) => void;
}

interface RoundOutcome {
  toolCalls: number;
}

export class AgentOrchestrator {
  private busy = false;
  private _lastTranscript: Transcript | null = null;
  private readonly systemPrompt: string;
  private readonly logger: DiagnosticSink | undefined;

  constructor(private readonly config: OrchestratorConfig) {
    this.systemPrompt = config.systemPrompt ?? DEFAULT_SYSTEM_PROMPT;
    this.logger = config.logger;
  }

  /** Transcript of the latest chat, complete or not. */
  get lastTranscript(): Transcript | null {
    return this._lastTranscript;
  }

  async chat(prompt: string, options: ChatOptions = {}): Promise<Transcript> {
    if (this.busy) {
      throw tetherError("invalid_state", "chat() is already running on this orchestrator");
    }
    this.busy = true;
    const transcript = new Transcript([
      { role: "system", content: this.systemPrompt },
      { role: "user", content: prompt },
    ]);
    this._lastTranscript = transcript;

    try {
      const maxRounds = Math.max(1, options.maxRounds ?? this.config.maxRounds ?? 1);
      for (let round = 1; round <= maxRounds; round++) {
        const outcome = await this.streamRound(transcript, options);
        if (outcome.toolCalls === 0) break;
        if (round < maxRounds) this.logger?.debug?.(`round ${round}: ${outcome.toolCalls} tool call(s), continuing`);
      }
      return transcript;
    } finally {
      this.busy = false;
    }
  }

  private async streamRound(transcript: Transcript, options: ChatOptions): Promise<RoundOutcome> {
    const { signal } = options;
    let accumulated = "";
    let expected = 0;
    const calls: ToolCallRequest[] = [];

    const fail = (kind: "stream_error" | "cancelled", message: string, cause?: unknown): TetherError =>
      tetherError(kind, message, { cause, transcript: transcript.messages, partialContent: accumulated });

    if (signal?.aborted) throw fail("cancelled", "chat cancelled");

    let iterator: AsyncIterator<StreamEvent>;
    try {
      iterator = this.config.backend
        .stream(transcript.messages, {
          model: options.model ?? this.config.model,
          tools: this.config.tools.definitions(),
          signal,
        })
        [Symbol.asyncIterator]();
    } catch (e: unknown) {
      throw fail("stream_error", `Failed to open stream: ${asError(e).message}`, e);
    }

    let finished = false;
    try {
      for (;;) {
        let next: IteratorResult<StreamEvent>;
        try {
          next = await untilAborted(() => iterator.next(), signal);
        } catch (e: unknown) {
          if (isCancelled(e)) throw fail("cancelled", "chat cancelled", e);
          const err = fail("stream_error", `Stream failed: ${asError(e).message}`, e);
          this.logger?.error("Model stream error:", errorLogFields(err));
          throw err;
        }
        if (next.done) {
          finished = true;
          break;
        }

        const event = next.value;
        if (event.type === "fragment") {
          if (event.index !== expected) {
            throw fail("stream_error", `Fragment out of order: expected index ${expected}, got ${event.index}`);
          }
          expected++;
          accumulated += event.delta;
          options.onFragment?.(event.delta);
        } else {
          calls.push(event.call);
          try {
            await this.runTool(event.call, transcript, options);
          } catch (e: unknown) {
            if (isCancelled(e)) throw fail("cancelled", "chat cancelled", e);
            throw e;
          }
        }
      }
    } finally {
      if (!finished) closeIterator(iterator, this.logger);
    }

    transcript.append({
      role: "assistant",
      content: accumulated,
      ...(calls.length > 0 ? { toolCalls: calls } : {}),
    });
    return { toolCalls: calls.length };
  }

  private async runTool(call: ToolCallRequest, transcript: Transcript, options: ChatOptions): Promise<void> {
    let content: string;
    let isError = false;
    this.logger?.debug?.(`[Tool call] ${call.name}(${JSON.stringify(call.arguments)})`);
    const { signal } = options;
    try {
      content = await untilAborted(() => this.config.tools.invoke(call.name, call.arguments, { signal }), signal);
    } catch (e: unknown) {
      if (signal?.aborted) throw isCancelled(e) ? e : tetherError("cancelled", "chat cancelled", { cause: e });
      isError = true;
      const ge = isTetherError(e) && e.kind === "tool_error"
        ? e
        : tetherError("tool_error", `Tool "${call.name}" failed: ${asError(e).message}`, { cause: e });
      this.logger?.error("Tool execution error:", errorLogFields(ge));
      content = `Error: ${ge.message}`;
    }
    transcript.append({ role: "tool", toolCallId: call.id, name: call.name, content, isError });
    options.onToolResult?.(call, content, isError);
  }
}

/** Await `start()`, giving up as soon as the signal fires. Nothing is started on an aborted signal. */
function untilAborted<T>(start: () => Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return start();
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(tetherError("cancelled", "chat cancelled"));
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener("abort", onAbort, { once: true });
    start().then(
      (r) => { signal.removeEventListener("abort", onAbort); resolve(r); },
      (e: unknown) => { signal.removeEventListener("abort", onAbort); reject(e); },
    );
  });
}

/**
 * Ask the backend to stop producing. Not awaited: a generator parked on a
 * slow read only honours return() once that read settles.
 */
function closeIterator<T>(iterator: AsyncIterator<T>, logger?: DiagnosticSink): void {
  if (!iterator.return) return;
  iterator.return().then(
    () => undefined,
    (e: unknown) => logger?.warn(`Closing model stream failed: ${asError(e).message}`),
  );
}
