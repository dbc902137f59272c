/**
 * ServerSession: one child process, one MCP endpoint on its stdio, one
 * lifecycle.
 *
 *   created ──start──▶ starting ──▶ running ──dispose──▶ disposing ──▶ disposed
 *                          │                                 ▲
 *                          └──▶ failed ──dispose─────────────┘
 *
 * The process and the endpoint only exist together, inside the `running`
 * variant of the state, so a session is never half started.
 */
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import type { DiagnosticSink } from "../logger.js";
import { ResourceGuard, type Releasable } from "../scope/resource-guard.js";
import {
  ProcessSession,
  freezeDescriptor,
  type ChildProcessDescriptor,
  type ManagedProcess,
  type ProcessExit,
  type ProcessHandle,
} from "../process/process-session.js";
import { ProcessStdioTransport } from "./process-transport.js";
import { asError, isCancelled, isTetherError, tetherError, type TetherError } from "../errors.js";

/** A protocol endpoint the session can attach to the child's stdio. Both the SDK's McpServer and Client fit. */
export interface ProtocolEndpoint {
  connect(transport: Transport): Promise<void>;
  close(): Promise<void>;
}

export type EndpointFactory<E extends ProtocolEndpoint> = (descriptor: ChildProcessDescriptor) => E;

export type SessionStatus = "created" | "starting" | "running" | "failed" | "disposing" | "disposed";

interface Live<E> {
  process: ManagedProcess;
  handle: ProcessHandle;
  endpoint: E;
  guard: ResourceGuard;
}

type SessionState<E> =
  | { status: "created" }
  | { status: "starting"; abort: AbortController }
  | { status: "running"; live: Live<E> }
  | { status: "failed"; error: TetherError }
  | { status: "disposing" }
  | { status: "disposed" };

export interface ServerSessionOptions<E extends ProtocolEndpoint> {
  descriptor: ChildProcessDescriptor;
  createEndpoint: EndpointFactory<E>;
  createProcess?: () => ManagedProcess;
  logger?: DiagnosticSink;
  killGraceMs?: number;
  /** Name used in diagnostics. Defaults to the command. */
  name?: string;
}

export type McpServerSessionOptions = Omit<ServerSessionOptions<McpServer>, "createEndpoint" | "descriptor"> & {
  serverInfo?: { name: string; version: string };
};

export class ServerSession<E extends ProtocolEndpoint> implements Releasable {
  private state: SessionState<E> = { status: "created" };
  private pendingStart: Promise<void> | null = null;
  private disposal: Promise<void> | null = null;
  private readonly descriptor: ChildProcessDescriptor;
  private readonly name: string;

  constructor(private readonly options: ServerSessionOptions<E>) {
    this.descriptor = freezeDescriptor(options.descriptor);
    this.name = options.name ?? this.descriptor.command;
  }

  /** A session whose endpoint is an McpServer talking over the child's stdio. */
  static mcpServer(descriptor: ChildProcessDescriptor, options: McpServerSessionOptions = {}): ServerSession<McpServer> {
    const { serverInfo, ...rest } = options;
    return new ServerSession<McpServer>({
      ...rest,
      descriptor,
      createEndpoint: (d) => new McpServer(serverInfo ?? { name: `External Process (${d.command})`, version: "1.0.0" }),
    });
  }

  get status(): SessionStatus {
    return this.state.status;
  }

  get endpoint(): E | undefined {
    return this.state.status === "running" ? this.state.live.endpoint : undefined;
  }

  get process(): ProcessHandle | undefined {
    return this.state.status === "running" ? this.state.live.handle : undefined;
  }

  get failure(): TetherError | undefined {
    return this.state.status === "failed" ? this.state.error : undefined;
  }

  /**
   * Spawn the child and connect the endpoint. Only valid from `created`;
   * any other state rejects with `invalid_state` and changes nothing.
   */
  start(signal?: AbortSignal): Promise<void> {
    if (this.state.status !== "created") {
      return Promise.reject(
        tetherError("invalid_state", `Cannot start session "${this.name}" in state "${this.state.status}"`),
      );
    }
    if (signal?.aborted) {
      return Promise.reject(tetherError("cancelled", `Start of "${this.name}" cancelled`));
    }
    const abort = new AbortController();
    const onAbort = () => abort.abort();
    signal?.addEventListener("abort", onAbort, { once: true });
    this.state = { status: "starting", abort };
    const run = this.establish(abort.signal).finally(() => signal?.removeEventListener("abort", onAbort));
    this.pendingStart = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  /** Start if needed, then wait for the child to exit. Cancelling disposes the session. */
  async run(signal?: AbortSignal): Promise<ProcessExit> {
    if (this.state.status === "created") await this.start(signal);
    const state = this.state;
    if (state.status !== "running") {
      throw tetherError("invalid_state", `Cannot run session "${this.name}" in state "${state.status}"`);
    }
    try {
      return await state.live.process.wait(signal);
    } catch (e: unknown) {
      if (isCancelled(e)) await this.dispose();
      throw e;
    }
  }

  /**
   * Close the endpoint, then kill the process, whether or not the close
   * worked. Never throws; failures go to the logger. The first call does
   * the work, every later call returns the same promise.
   */
  dispose(): Promise<void> {
    if (this.disposal) return this.disposal;
    const prior = this.state;
    this.state = { status: "disposing" };
    this.disposal = this.teardown(prior);
    return this.disposal;
  }

  private async teardown(prior: SessionState<E>): Promise<void> {
    try {
      if (prior.status === "running") {
        await prior.live.guard.release();
      } else if (prior.status === "starting") {
        prior.abort.abort();
        await this.pendingStart;
      }
    } finally {
      this.state = { status: "disposed" };
    }
  }

  private async establish(signal: AbortSignal): Promise<void> {
    const guard = new ResourceGuard({ logger: this.options.logger, label: this.name });
    const proc = this.options.createProcess?.() ??
      new ProcessSession({ logger: this.options.logger, killGraceMs: this.options.killGraceMs, label: this.name });

    try {
      const handle = await guard.acquire(
        "process",
        () => proc.start(this.descriptor, signal),
        async () => { await proc.kill(); },
      );
      const endpoint = await guard.acquire(
        "protocol endpoint",
        () => this.connectEndpoint(proc, handle, signal),
        (ep) => ep.close(),
      );
      if (signal.aborted || this.state.status !== "starting") {
        throw tetherError("cancelled", `Start of "${this.name}" cancelled`);
      }
      this.state = { status: "running", live: { process: proc, handle, endpoint, guard } };
      this.options.logger?.debug?.(`[${this.name}] running (pid ${handle.pid})`);
    } catch (e: unknown) {
      const cleanup = await guard.release();
      const err = this.classify(e, signal);
      if (cleanup.length > 0) err.suppressed = [...(err.suppressed ?? []), ...cleanup];
      if (this.state.status === "starting") this.state = { status: "failed", error: err };
      throw err;
    }
  }

  /**
   * Connect a fresh endpoint to the child's stdio. An abort kills the child:
   * a handshake the child never answers only ends when its stdout does.
   */
  private async connectEndpoint(proc: ManagedProcess, handle: ProcessHandle, signal: AbortSignal): Promise<E> {
    if (signal.aborted) throw tetherError("cancelled", `Start of "${this.name}" cancelled`);
    const ep = this.options.createEndpoint(this.descriptor);
    const onAbort = () => {
      proc.kill().catch((e: unknown) =>
        this.options.logger?.warn(`[${this.name}] kill after cancelled start failed: ${asError(e).message}`),
      );
    };
    signal.addEventListener("abort", onAbort, { once: true });
    try {
      await ep.connect(new ProcessStdioTransport(handle.stdout, handle.stdin));
    } finally {
      signal.removeEventListener("abort", onAbort);
    }
    return ep;
  }

  private classify(e: unknown, signal: AbortSignal): TetherError {
    if (isTetherError(e) && (e.kind === "spawn_error" || e.kind === "cancelled")) return e;
    if (signal.aborted) {
      return tetherError("cancelled", `Start of "${this.name}" cancelled`, { cause: e });
    }
    return tetherError("mcp_error", `Failed to connect endpoint for "${this.name}": ${asError(e).message}`, {
      cause: e,
    });
  }
}
