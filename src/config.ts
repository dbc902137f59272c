/**
 * CLI argument parsing, configuration loading, and help text.
 *
 * Everything comes in through the two arguments; nothing below reads
 * process.env or process.argv on its own.
 */

import { readFileSync, existsSync } from "node:fs";
import { tetherError, asError } from "./errors.js";
import { parseLogLevel, type LogLevel } from "./logger.js";
import { DEFAULT_SYSTEM_PROMPT } from "./agent/orchestrator.js";
import type { ChildProcessDescriptor } from "./process/process-session.js";

export const VERSION = "0.1.0";

export interface McpServerConfig extends ChildProcessDescriptor {
  args: string[];
}

export interface TetherConfig {
  prompt: string;
  model: string;
  baseUrl: string;
  apiKey?: string;
  systemPrompt: string;
  maxRounds: number;
  killGraceMs: number;
  mcpServers: Record<string, McpServerConfig>;
  verbose: boolean;
  logLevel: LogLevel;
  showHelp: boolean;
  showVersion: boolean;
}

export type Env = Readonly<Record<string, string | undefined>>;

const DEFAULT_MODEL = "gpt-4o";
const DEFAULT_BASE_URL = "https://api.openai.com";

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function isStringArray(v: unknown): v is string[] {
  return Array.isArray(v) && v.every((a) => typeof a === "string");
}

function isStringRecord(v: unknown): v is Record<string, string> {
  return isRecord(v) && Object.values(v).every((a) => typeof a === "string");
}

/** Validate one `mcpServers` entry. */
export function parseServerEntry(name: string, raw: unknown): McpServerConfig {
  if (!isRecord(raw)) {
    throw tetherError("config_error", `MCP server "${name}" must be an object`);
  }
  const { command, args, env, cwd } = raw;
  if (typeof command !== "string" || !command) {
    throw tetherError("config_error", `MCP server "${name}" needs a "command" string`);
  }
  if (args !== undefined && !isStringArray(args)) {
    throw tetherError("config_error", `MCP server "${name}": "args" must be an array of strings`);
  }
  if (env !== undefined && !isStringRecord(env)) {
    throw tetherError("config_error", `MCP server "${name}": "env" must map names to strings`);
  }
  if (cwd !== undefined && typeof cwd !== "string") {
    throw tetherError("config_error", `MCP server "${name}": "cwd" must be a string`);
  }
  return { command, args: args ?? [], env, cwd };
}

/**
 * Read MCP server definitions from a file path or inline JSON. Both the
 * `{ "mcpServers": {...} }` wrapper and a bare map are accepted.
 */
export function loadMcpServers(source: string): Record<string, McpServerConfig> {
  let raw: string;
  if (source.trimStart().startsWith("{")) {
    raw = source;
  } else if (existsSync(source)) {
    raw = readFileSync(source, "utf-8");
  } else {
    throw tetherError("config_error", `MCP config not found: ${source}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e: unknown) {
    throw tetherError("config_error", `Failed to parse MCP config ${source}: ${asError(e).message}`, { cause: e });
  }
  const servers = isRecord(parsed) && isRecord(parsed.mcpServers) ? parsed.mcpServers : parsed;
  if (!isRecord(servers)) {
    throw tetherError("config_error", `MCP config ${source} must be an object`);
  }
  const out: Record<string, McpServerConfig> = {};
  for (const [name, entry] of Object.entries(servers)) {
    out[name] = parseServerEntry(name, entry);
  }
  return out;
}

function positiveInt(flag: string, value: string | undefined, min: number): number {
  const n = Number(value);
  if (value === undefined || !Number.isInteger(n) || n < min) {
    throw tetherError("config_error", `${flag} expects an integer >= ${min}, got "${value ?? ""}"`);
  }
  return n;
}

export function loadConfig(argv: readonly string[], env: Env): TetherConfig {
  const flags: Record<string, string> = {};
  const positional: string[] = [];
  const mcpSources: string[] = [];

  const value = (flag: string, i: number): string => {
    const v = argv[i];
    if (v === undefined) throw tetherError("config_error", `${flag} requires a value`);
    return v;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--model" || arg === "-m") { flags.model = value(arg, ++i); }
    else if (arg === "--base-url") { flags.baseUrl = value(arg, ++i); }
    else if (arg === "--system-prompt") { flags.systemPrompt = value(arg, ++i); }
    else if (arg === "--max-rounds") { flags.maxRounds = value(arg, ++i); }
    else if (arg === "--kill-grace-ms") { flags.killGraceMs = value(arg, ++i); }
    else if (arg === "--mcp-config") { mcpSources.push(value(arg, ++i)); }
    else if (arg === "--verbose" || arg === "-v") { flags.verbose = "true"; }
    else if (arg === "--help" || arg === "-h") { flags.help = "true"; }
    else if (arg === "--version" || arg === "-V") { flags.version = "true"; }
    else if (arg.startsWith("-") && arg !== "-") {
      throw tetherError("config_error", `Unknown flag: ${arg}`);
    }
    else { positional.push(arg); }
  }

  const mcpServers: Record<string, McpServerConfig> = {};
  for (const src of mcpSources) Object.assign(mcpServers, loadMcpServers(src));

  return {
    prompt: positional.join(" "),
    model: flags.model ?? env.TETHER_MODEL ?? DEFAULT_MODEL,
    baseUrl: flags.baseUrl ?? env.TETHER_BASE_URL ?? DEFAULT_BASE_URL,
    apiKey: env.TETHER_API_KEY ?? env.OPENAI_API_KEY,
    systemPrompt: flags.systemPrompt ?? DEFAULT_SYSTEM_PROMPT,
    maxRounds: flags.maxRounds !== undefined ? positiveInt("--max-rounds", flags.maxRounds, 1) : 4,
    killGraceMs: flags.killGraceMs !== undefined ? positiveInt("--kill-grace-ms", flags.killGraceMs, 0) : 2000,
    mcpServers,
    verbose: flags.verbose === "true",
    logLevel: parseLogLevel(env.TETHER_LOG_LEVEL),
    showHelp: flags.help === "true",
    showVersion: flags.version === "true",
  };
}

export function usage(): string {
  return `tether ${VERSION}: run a prompt against a streaming model with MCP tool servers

usage:
  tether [options] <prompt>

options:
  -m, --model <name>       model name (default: ${DEFAULT_MODEL}, env TETHER_MODEL)
  --base-url <url>         OpenAI-compatible endpoint (default: ${DEFAULT_BASE_URL}, env TETHER_BASE_URL)
  --system-prompt <text>   system instruction
  --max-rounds <n>         stream rounds per prompt when tools are called (default: 4)
  --kill-grace-ms <ms>     SIGTERM grace period before SIGKILL (default: 2000)
  --mcp-config <path|json> MCP servers, { "mcpServers": { name: { command, args, env, cwd } } }
  -v, --verbose            verbose output (debug logs need TETHER_LOG_LEVEL=DEBUG)
  -h, --help               show this help
  -V, --version            show version

environment:
  TETHER_API_KEY (or OPENAI_API_KEY)  bearer token for the model endpoint`;
}
