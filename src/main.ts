#!/usr/bin/env node
/**
 * tether CLI: start the configured MCP tool servers, run one prompt against
 * a streaming model with their tools, stop the servers.
 */
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { Logger, C } from "./logger.js";
import { asError, errorLogFields, isTetherError } from "./errors.js";
import { loadConfig, usage, VERSION, type TetherConfig } from "./config.js";
import { ServerSession } from "./mcp/server-session.js";
import { registerServerTools } from "./mcp/tool-bridge.js";
import { ResourceGuard, type Acquirer } from "./scope/resource-guard.js";
import { ToolRegistry } from "./tools/tool-registry.js";
import { AgentOrchestrator } from "./agent/orchestrator.js";
import { makeStreamingOpenAiBackend } from "./drivers/streaming-openai.js";

interface NamedSession {
  name: string;
  session: ServerSession<Client>;
}

function createSessions(cfg: TetherConfig): NamedSession[] {
  return Object.entries(cfg.mcpServers).map(([name, descriptor]) => ({
    name,
    session: new ServerSession<Client>({
      descriptor,
      name,
      logger: Logger,
      killGraceMs: cfg.killGraceMs,
      createEndpoint: () => new Client({ name: "tether", version: VERSION }, { capabilities: {} }),
    }),
  }));
}

async function run(cfg: TetherConfig, signal: AbortSignal): Promise<number> {
  const sessions = createSessions(cfg);
  if (sessions.length > 0) Logger.debug(`Starting ${sessions.length} MCP server(s)...`);

  const acquirers: Acquirer<ServerSession<Client>>[] = sessions.map(({ name, session }) => ({
    name,
    acquire: async () => {
      await session.start(signal);
      return session;
    },
    release: (s) => s.dispose(),
  }));
  const guard = await ResourceGuard.open(acquirers, { logger: Logger, label: "mcp" });

  return guard.use(async () => {
    const registry = new ToolRegistry();
    for (const { name, session } of sessions) {
      const client = session.endpoint;
      if (client) await registerServerTools(registry, client, { serverName: name, logger: Logger });
    }

    const agent = new AgentOrchestrator({
      backend: makeStreamingOpenAiBackend({ baseUrl: cfg.baseUrl, model: cfg.model, apiKey: cfg.apiKey }),
      tools: registry,
      model: cfg.model,
      systemPrompt: cfg.systemPrompt,
      maxRounds: cfg.maxRounds,
      logger: Logger,
    });

    await agent.chat(cfg.prompt, {
      signal,
      onFragment: (delta) => Logger.streamInfo(delta),
      onToolResult: (call, _content, isError) => {
        const mark = isError ? C.red("✗") : C.green("✓");
        process.stderr.write(C.gray(`  → ${call.name}() `) + mark + "\n");
      },
    });
    Logger.endStreamLine();
    return 0;
  });
}

export async function main(argv: readonly string[] = process.argv.slice(2), env: NodeJS.ProcessEnv = process.env): Promise<number> {
  let cfg: TetherConfig;
  try {
    cfg = loadConfig(argv, env);
  } catch (e: unknown) {
    Logger.error(C.red(asError(e).message));
    Logger.error(usage());
    return 2;
  }
  if (cfg.showVersion) {
    Logger.info(VERSION);
    return 0;
  }
  if (cfg.showHelp || !cfg.prompt) {
    Logger.info(usage());
    return cfg.showHelp ? 0 : 2;
  }
  Logger.setVerbose(cfg.verbose);
  Logger.setLevel(cfg.logLevel);

  const abort = new AbortController();
  const onSigint = () => abort.abort();
  process.once("SIGINT", onSigint);
  try {
    return await run(cfg, abort.signal);
  } catch (e: unknown) {
    const err = asError(e);
    if (isTetherError(err)) {
      Logger.error(C.red(`tether: ${err.message}`));
      Logger.debug(errorLogFields(err));
      if (err.partialContent) Logger.error(C.gray(`partial response: ${err.partialContent}`));
    } else {
      Logger.error(C.red(`tether: ${err.message}`));
      if (err.stack) Logger.debug(err.stack);
    }
    return 1;
  } finally {
    process.off("SIGINT", onSigint);
  }
}

main().then(
  (code) => { process.exitCode = code; },
  (e: unknown) => {
    const err = asError(e);
    Logger.error("tether:", err.message);
    if (err.stack) Logger.error(err.stack);
    process.exitCode = 1;
  },
);
