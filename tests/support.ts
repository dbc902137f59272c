import http from "node:http";
import type { DiagnosticSink } from "../src/logger.js";

export interface TestServer {
  port: number;
  url: string;
  close: () => Promise<void>;
}

export function startServer(handler: http.RequestListener): Promise<TestServer> {
  return new Promise((resolve) => {
    const server = http.createServer(handler);
    server.listen(0, "127.0.0.1", () => {
      const addr = server.address();
      const port = typeof addr === "object" && addr !== null ? addr.port : 0;
      resolve({
        port,
        url: `http://127.0.0.1:${port}`,
        close: () =>
          new Promise<void>((r) => {
            server.closeAllConnections();
            server.close(() => r());
          }),
      });
    });
  });
}

/** Collects everything components report, for assertions. */
export class RecordingSink implements DiagnosticSink {
  readonly warnings: string[] = [];
  readonly errors: string[] = [];
  readonly debugs: string[] = [];

  warn(...args: unknown[]): void { this.warnings.push(args.map(String).join(" ")); }
  error(...args: unknown[]): void { this.errors.push(args.map(String).join(" ")); }
  debug(...args: unknown[]): void { this.debugs.push(args.map(String).join(" ")); }
}

export function delay(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}
