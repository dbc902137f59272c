export { Logger, C, parseLogLevel, type DiagnosticSink, type LogLevel } from "./logger.js";
export {
  tetherError,
  asError,
  isTetherError,
  isCancelled,
  withSuppressed,
  errorLogFields,
  type TetherError,
  type TetherErrorKind,
  type TetherErrorOptions,
} from "./errors.js";
export {
  ProcessSession,
  freezeDescriptor,
  type ChildProcessDescriptor,
  type ProcessHandle,
  type ProcessExit,
  type ManagedProcess,
  type ProcessSessionOptions,
} from "./process/process-session.js";
export { ResourceGuard, releasable, type Releasable, type Acquirer, type ResourceGuardOptions } from "./scope/resource-guard.js";
export { ProcessStdioTransport } from "./mcp/process-transport.js";
export {
  ServerSession,
  type ProtocolEndpoint,
  type EndpointFactory,
  type SessionStatus,
  type ServerSessionOptions,
  type McpServerSessionOptions,
} from "./mcp/server-session.js";
export { registerServerTools, renderToolResult, type ToolProvider, type BridgeOptions } from "./mcp/tool-bridge.js";
export { ToolRegistry, type ToolDescriptor, type ToolInvocationContext } from "./tools/tool-registry.js";
export { Transcript } from "./agent/transcript.js";
export { AgentOrchestrator, DEFAULT_SYSTEM_PROMPT, type OrchestratorConfig, type ChatOptions } from "./agent/orchestrator.js";
export { makeStreamingOpenAiBackend, toWireMessages, type OpenAiBackendConfig } from "./drivers/streaming-openai.js";
export type {
  ChatMessage,
  ChatRole,
  ModelBackend,
  StreamEvent,
  StreamOptions,
  StreamingFragment,
  ToolCallRequest,
  ToolDefinition,
} from "./drivers/types.js";
export { loadConfig, loadMcpServers, parseServerEntry, usage, VERSION, type TetherConfig, type McpServerConfig } from "./config.js";
