/**
 * MCP transport over a child's stdout/stdin pair.
 *
 * The bytes are opaque here: framing belongs to the SDK's ReadBuffer and
 * serializeMessage, message semantics to whatever endpoint connects.
 */
import type { Readable, Writable } from "node:stream";
import { ReadBuffer, serializeMessage } from "@modelcontextprotocol/sdk/shared/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import type { JSONRPCMessage } from "@modelcontextprotocol/sdk/types.js";
import { asError } from "../errors.js";

export class ProcessStdioTransport implements Transport {
  private readonly readBuffer = new ReadBuffer();
  private started = false;
  private closed = false;

  onclose?: Transport["onclose"];
  onerror?: Transport["onerror"];
  onmessage?: Transport["onmessage"];

  constructor(
    private readonly input: Readable,
    private readonly output: Writable,
  ) {}

  async start(): Promise<void> {
    if (this.started) {
      throw new Error("ProcessStdioTransport already started");
    }
    this.started = true;
    this.input.on("data", this.onData);
    this.input.on("error", this.onStreamError);
    this.input.on("end", this.onEnd);
    this.output.on("error", this.onStreamError);
  }

  async send(message: JSONRPCMessage): Promise<void> {
    if (this.closed) throw new Error("Transport is closed");
    const json = serializeMessage(message);
    await new Promise<void>((resolve) => {
      if (this.output.write(json)) resolve();
      else this.output.once("drain", resolve);
    });
  }

  async close(): Promise<void> {
    this.input.off("data", this.onData);
    this.input.off("error", this.onStreamError);
    this.input.off("end", this.onEnd);
    this.output.off("error", this.onStreamError);
    this.readBuffer.clear();
    if (this.closed) return;
    this.closed = true;
    this.onclose?.();
  }

  private readonly onData = (chunk: Buffer) => {
    this.readBuffer.append(chunk);
    this.drain();
  };

  private readonly onStreamError = (error: Error) => {
    this.onerror?.(error);
  };

  private readonly onEnd = () => {
    this.close().catch((e: unknown) => this.onerror?.(asError(e)));
  };

  private drain(): void {
    for (;;) {
      let message: JSONRPCMessage | null;
      try {
        message = this.readBuffer.readMessage();
      } catch (e: unknown) {
        // the bad line is already consumed; keep reading
        this.onerror?.(asError(e));
        continue;
      }
      if (message === null) break;
      this.onmessage?.(message);
    }
  }
}
