/**
 * Tests for CLI argument parsing and MCP server config loading.
 */

import { test, describe } from "node:test";
import assert from "node:assert";
import { mkdtempSync, writeFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { loadConfig, loadMcpServers, parseServerEntry, usage, VERSION } from "../src/config.js";
import { DEFAULT_SYSTEM_PROMPT } from "../src/agent/orchestrator.js";
import { isTetherError } from "../src/errors.js";

function isConfigError(message: string) {
  return (err: unknown): boolean => isTetherError(err) && err.kind === "config_error" && err.message === message;
}

describe("loadConfig", () => {
  test("defaults", () => {
    const cfg = loadConfig(["what", "is", "up"], {});
    assert.deepStrictEqual(cfg, {
      prompt: "what is up",
      model: "gpt-4o",
      baseUrl: "https://api.openai.com",
      apiKey: undefined,
      systemPrompt: DEFAULT_SYSTEM_PROMPT,
      maxRounds: 4,
      killGraceMs: 2000,
      mcpServers: {},
      verbose: false,
      logLevel: "INFO",
      showHelp: false,
      showVersion: false,
    });
  });

  test("flags win over environment", () => {
    const cfg = loadConfig(["-m", "flag-model", "--base-url", "http://localhost:1234", "hi"], {
      TETHER_MODEL: "env-model",
      TETHER_BASE_URL: "http://env",
    });
    assert.strictEqual(cfg.model, "flag-model");
    assert.strictEqual(cfg.baseUrl, "http://localhost:1234");
  });

  test("environment fills in what flags leave out", () => {
    const cfg = loadConfig(["hi"], {
      TETHER_MODEL: "env-model",
      TETHER_BASE_URL: "http://env",
      OPENAI_API_KEY: "test-secret",
      TETHER_LOG_LEVEL: "debug",
    });
    assert.strictEqual(cfg.model, "env-model");
    assert.strictEqual(cfg.baseUrl, "http://env");
    assert.strictEqual(cfg.apiKey, "test-secret");
    assert.strictEqual(cfg.logLevel, "DEBUG");
  });

  test("TETHER_API_KEY takes precedence over OPENAI_API_KEY", () => {
    const cfg = loadConfig(["hi"], { TETHER_API_KEY: "tether-key", OPENAI_API_KEY: "openai-key" });
    assert.strictEqual(cfg.apiKey, "tether-key");
  });

  test("numeric and boolean flags", () => {
    const cfg = loadConfig(
      ["--max-rounds", "2", "--kill-grace-ms", "0", "-v", "--system-prompt", "terse", "-h", "-V", "x"],
      {},
    );
    assert.strictEqual(cfg.maxRounds, 2);
    assert.strictEqual(cfg.killGraceMs, 0);
    assert.strictEqual(cfg.verbose, true);
    assert.strictEqual(cfg.systemPrompt, "terse");
    assert.strictEqual(cfg.showHelp, true);
    assert.strictEqual(cfg.showVersion, true);
  });

  test("rejects bad numbers", () => {
    assert.throws(() => loadConfig(["--max-rounds", "0"], {}), isConfigError('--max-rounds expects an integer >= 1, got "0"'));
    assert.throws(() => loadConfig(["--kill-grace-ms", "soon"], {}), isConfigError('--kill-grace-ms expects an integer >= 0, got "soon"'));
  });

  test("rejects unknown flags and missing values", () => {
    assert.throws(() => loadConfig(["--frobnicate"], {}), isConfigError("Unknown flag: --frobnicate"));
    assert.throws(() => loadConfig(["--model"], {}), isConfigError("--model requires a value"));
  });

  test("inline MCP config is merged into mcpServers", () => {
    const cfg = loadConfig(
      ["--mcp-config", '{"mcpServers":{"fs":{"command":"fs-server","args":["--root","/tmp"]}}}', "--mcp-config", '{"git":{"command":"git-server"}}', "hi"],
      {},
    );
    assert.deepStrictEqual(cfg.mcpServers, {
      fs: { command: "fs-server", args: ["--root", "/tmp"], env: undefined, cwd: undefined },
      git: { command: "git-server", args: [], env: undefined, cwd: undefined },
    });
  });
});

describe("loadMcpServers", () => {
  test("reads a config file", () => {
    const dir = mkdtempSync(join(tmpdir(), "tether-config-"));
    try {
      const file = join(dir, "mcp.json");
      writeFileSync(file, JSON.stringify({ mcpServers: { echo: { command: "echo-server", env: { MODE: "test" }, cwd: "/srv" } } }));
      assert.deepStrictEqual(loadMcpServers(file), {
        echo: { command: "echo-server", args: [], env: { MODE: "test" }, cwd: "/srv" },
      });
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  test("a missing file is a config_error", () => {
    assert.throws(() => loadMcpServers("/nonexistent/tether-mcp.json"), isConfigError("MCP config not found: /nonexistent/tether-mcp.json"));
  });

  test("invalid JSON is a config_error", () => {
    assert.throws(
      () => loadMcpServers("{nope"),
      (err: unknown) => isTetherError(err) && err.kind === "config_error" && err.message.startsWith("Failed to parse MCP config {nope:"),
    );
  });
});

describe("parseServerEntry", () => {
  test("requires a command", () => {
    assert.throws(() => parseServerEntry("x", { args: [] }), isConfigError('MCP server "x" needs a "command" string'));
  });

  test("validates field types", () => {
    assert.throws(() => parseServerEntry("x", "cmd"), isConfigError('MCP server "x" must be an object'));
    assert.throws(() => parseServerEntry("x", { command: "c", args: [1] }), isConfigError('MCP server "x": "args" must be an array of strings'));
    assert.throws(() => parseServerEntry("x", { command: "c", env: { A: 1 } }), isConfigError('MCP server "x": "env" must map names to strings'));
    assert.throws(() => parseServerEntry("x", { command: "c", cwd: 5 }), isConfigError('MCP server "x": "cwd" must be a string'));
  });
});

describe("usage", () => {
  test("names the version and every flag", () => {
    const text = usage();
    assert.ok(text.startsWith(`tether ${VERSION}:`));
    for (const flag of ["--model", "--base-url", "--system-prompt", "--max-rounds", "--kill-grace-ms", "--mcp-config", "--verbose", "--help", "--version"]) {
      assert.ok(text.includes(flag), flag);
    }
  });
});
