export interface ToolCallRequest {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

export type ChatMessage =
  | { role: "system"; content: string }
  | { role: "user"; content: string }
  | {
      role: "assistant";
      content: string;
      /** Tool calls the model issued while producing this message. */
      toolCalls?: ToolCallRequest[];
    }
  | {
      role: "tool";
      content: string;
      /** Id of the tool call being answered. */
      toolCallId: string;
      name: string;
      isError: boolean;
    };

export type ChatRole = ChatMessage["role"];

/** A tool as advertised to the model. */
export interface ToolDefinition {
  name: string;
  description: string;
  /** JSON schema of the argument object. */
  parameters: Record<string, unknown>;
}

/** One incremental piece of a response. Indices start at 0 per response. */
export interface StreamingFragment {
  index: number;
  delta: string;
}

export type StreamEvent =
  | ({ type: "fragment" } & StreamingFragment)
  | { type: "tool_call"; call: ToolCallRequest };

export interface StreamOptions {
  model?: string;
  tools: ToolDefinition[];
  signal?: AbortSignal;
}

/**
 * A model that answers an ordered message list with an asynchronous sequence
 * of events, terminated by completion or by throwing.
 */
export interface ModelBackend {
  stream(messages: readonly ChatMessage[], opts: StreamOptions): AsyncIterable<StreamEvent>;
}
