import { spawn, type ChildProcess } from "node:child_process";
import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import type { DiagnosticSink } from "../logger.js";
import { asError, tetherError } from "../errors.js";

export interface ChildProcessDescriptor {
  readonly command: string;
  readonly args: readonly string[];
  /** Overlaid on the parent environment. */
  readonly env?: Readonly<Record<string, string>>;
  readonly cwd?: string;
}

export interface ProcessHandle {
  readonly pid: number;
  readonly stdin: Writable;
  readonly stdout: Readable;
  readonly stderr: Readable;
  readonly running: boolean;
}

export interface ProcessExit {
  code: number | null;
  signal: NodeJS.Signals | null;
  /** True when the process had to be SIGKILLed after the grace period. */
  forced: boolean;
}

/** What a ServerSession needs from the process it owns. */
export interface ManagedProcess {
  readonly pid: number | undefined;
  start(descriptor: ChildProcessDescriptor, signal?: AbortSignal): Promise<ProcessHandle>;
  kill(): Promise<ProcessExit | undefined>;
  wait(signal?: AbortSignal): Promise<ProcessExit>;
}

export interface ProcessSessionOptions {
  logger?: DiagnosticSink;
  /** How long SIGTERM gets before SIGKILL. Default 2000 ms. */
  killGraceMs?: number;
  /** Prefix for diagnostics. Defaults to the command. */
  label?: string;
  onStderrLine?: (line: string) => void;
}

type Phase = "idle" | "starting" | "running" | "exited" | "failed";

export function freezeDescriptor(d: ChildProcessDescriptor): ChildProcessDescriptor {
  return Object.freeze({
    command: d.command,
    args: Object.freeze([...d.args]),
    env: d.env ? Object.freeze({ ...d.env }) : undefined,
    cwd: d.cwd,
  });
}

/**
 * Owns one child process. stdin/stdout are handed out untouched; stderr is
 * drained line by line into the diagnostic sink so a chatty child can never
 * fill its stderr pipe and stall the protocol channel.
 */
export class ProcessSession implements ManagedProcess {
  private child: ChildProcess | null = null;
  private phase: Phase = "idle";
  private exitInfo: ProcessExit | null = null;
  private exited: Promise<ProcessExit> | null = null;
  private termination: Promise<ProcessExit> | null = null;
  private forced = false;
  private _pid: number | undefined;
  private _stderrLines = 0;
  private readonly graceMs: number;

  constructor(private readonly options: ProcessSessionOptions = {}) {
    this.graceMs = options.killGraceMs ?? 2000;
  }

  get pid(): number | undefined { return this._pid; }
  get running(): boolean { return this.phase === "running"; }
  get exit(): ProcessExit | null { return this.exitInfo; }
  get stderrLineCount(): number { return this._stderrLines; }

  async start(descriptor: ChildProcessDescriptor, signal?: AbortSignal): Promise<ProcessHandle> {
    if (this.phase !== "idle") {
      throw tetherError("already_started", `Process session already ${this.phase}`);
    }
    if (signal?.aborted) {
      throw tetherError("cancelled", "Process start cancelled before spawn");
    }
    const desc = freezeDescriptor(descriptor);
    const label = this.options.label ?? desc.command;
    this.phase = "starting";

    const child = spawn(desc.command, [...desc.args], {
      stdio: ["pipe", "pipe", "pipe"],
      env: { ...process.env, ...desc.env },
      cwd: desc.cwd,
      shell: false,
      windowsHide: true,
      // own process group, so kill() reaches grandchildren too
      detached: process.platform !== "win32",
    });
    this.child = child;

    this.exited = new Promise<ProcessExit>((resolve) => {
      child.once("exit", (code, sig) => {
        this.phase = "exited";
        this.exitInfo = { code, signal: sig, forced: this.forced };
        this.options.logger?.debug?.(`[${label}] exited code=${code} signal=${sig}`);
        resolve(this.exitInfo);
      });
    });

    try {
      await new Promise<void>((resolve, reject) => {
        const onSpawn = () => { child.off("error", onError); resolve(); };
        const onError = (err: Error) => { child.off("spawn", onSpawn); reject(err); };
        child.once("spawn", onSpawn);
        child.once("error", onError);
      });
    } catch (e: unknown) {
      this.phase = "failed";
      this.child = null;
      this.exited = null;
      throw tetherError("spawn_error", `Failed to start process "${desc.command}": ${asError(e).message}`, {
        cause: e,
      });
    }

    this._pid = child.pid;
    // Errors after spawn (failed kill, EPIPE on stdin) must not crash the host.
    child.on("error", (err) => this.options.logger?.warn(`[${label}] process error: ${err.message}`));
    child.stdin?.on("error", (err) => this.options.logger?.warn(`[${label}] stdin error: ${err.message}`));

    const { stdin, stdout, stderr } = child;
    const pid = child.pid;
    if (!stdin || !stdout || !stderr || pid === undefined) {
      await this.kill();
      this.phase = "failed";
      throw tetherError("spawn_error", `Process "${desc.command}" started without piped stdio`);
    }

    this.drainStderr(stderr, label);
    if (this.phase === "starting") this.phase = "running";

    if (signal?.aborted) {
      await this.kill();
      this.phase = "failed";
      throw tetherError("cancelled", `Process start cancelled; "${desc.command}" was killed`);
    }

    const session = this;
    return {
      pid,
      stdin,
      stdout,
      stderr,
      get running() { return session.running; },
    };
  }

  /**
   * Terminate the process tree: SIGTERM, then SIGKILL once the grace period
   * runs out. Resolves after the exit has been observed. Every caller shares
   * the same termination; nothing is signalled twice.
   */
  kill(): Promise<ProcessExit | undefined> {
    if (this.termination) return this.termination;
    const child = this.child;
    const exited = this.exited;
    if (!child || !exited || this.exitInfo) {
      return Promise.resolve(this.exitInfo ?? undefined);
    }
    this.termination = this.terminate(child, exited);
    return this.termination;
  }

  async wait(signal?: AbortSignal): Promise<ProcessExit> {
    const exited = this.exited;
    if (!exited) {
      throw tetherError("invalid_state", `Cannot wait on a process that is ${this.phase}`);
    }
    if (this.exitInfo) return this.exitInfo;
    if (!signal) return exited;
    if (signal.aborted) {
      await this.kill();
      throw tetherError("cancelled", "Wait cancelled; process was killed");
    }
    return new Promise<ProcessExit>((resolve, reject) => {
      const onAbort = () => {
        this.kill().then(
          () => reject(tetherError("cancelled", "Wait cancelled; process was killed")),
          reject,
        );
      };
      signal.addEventListener("abort", onAbort, { once: true });
      exited.then((exit) => {
        if (signal.aborted) return;
        signal.removeEventListener("abort", onAbort);
        resolve(exit);
      }, reject);
    });
  }

  private async terminate(child: ChildProcess, exited: Promise<ProcessExit>): Promise<ProcessExit> {
    this.signalTree(child, "SIGTERM");
    const graceful = await withinMs(exited, this.graceMs);
    if (graceful) return graceful;
    this.forced = true;
    this.options.logger?.warn(`[${this.options.label ?? child.spawnfile}] ignored SIGTERM for ${this.graceMs}ms, sending SIGKILL`);
    this.signalTree(child, "SIGKILL");
    return exited;
  }

  private signalTree(child: ChildProcess, sig: NodeJS.Signals): void {
    const pid = child.pid;
    if (pid === undefined) return;
    if (process.platform === "win32") {
      const killer = spawn("taskkill", ["/pid", String(pid), "/T", "/F"], { stdio: "ignore", windowsHide: true });
      killer.on("error", (err) => {
        this.options.logger?.warn(`taskkill failed for ${pid}: ${err.message}`);
        child.kill(sig);
      });
      return;
    }
    try {
      process.kill(-pid, sig);
    } catch (e: unknown) {
      const err = asError(e);
      if ("code" in err && err.code === "ESRCH") return; // group already gone
      this.options.logger?.warn(`Group kill of ${pid} failed: ${err.message}`);
      child.kill(sig);
    }
  }

  private drainStderr(stderr: Readable, label: string): void {
    const lines = createInterface({ input: stderr, crlfDelay: Infinity });
    lines.on("line", (line) => {
      this._stderrLines++;
      this.options.logger?.warn(`[${label}] stderr: ${line}`);
      this.options.onStderrLine?.(line);
    });
    stderr.on("error", (err) => this.options.logger?.warn(`[${label}] stderr error: ${err.message}`));
  }
}

async function withinMs<T>(p: Promise<T>, ms: number): Promise<T | undefined> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<undefined>((resolve) => {
    timer = setTimeout(() => resolve(undefined), ms);
  });
  try {
    return await Promise.race([p, timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}
