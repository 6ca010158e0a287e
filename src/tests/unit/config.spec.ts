import {describe, expect, it} from "vitest";

import {resolveConfig, splitCommand} from "../../config.js";
import {ConfigError} from "../../errors.js";
import {parseArgs} from "../../parseArgs.js";

describe("resolveConfig", () => {
  it("falls back to defaults", () => {
    const config = resolveConfig(parseArgs([]), {}, "/work");

    expect(config.url).toBe("http://localhost:3000/mcp");
    expect(config.stdioCommand).toBeUndefined();
    expect(config.requestTimeoutMs).toBe(30_000);
    expect(config.historyFile).toBe("/work/.mcp_history");
    expect(config.historyLimit).toBe(500);
    expect(config.operations).toEqual({
      evaluateOperation: "nrepl-eval",
      statusOperation: "nrepl-status",
      healthOperation: "nrepl-health-check",
      testOperation: "nrepl-test"
    });
    expect(config.listingFormat).toBe("text");
    expect(config.debug).toBe(false);
    expect(config.supervisor).toEqual({
      port: 3000,
      command: ["bb", "src/mcp_nrepl_proxy/core.clj"],
      cwd: "/work",
      pidFile: "/work/server_3000.pid",
      logFile: "/work/server_3000.log"
    });
  });

  it("prefers flags over the environment", () => {
    const env = {MCP_SERVER_URL: "http://env:1/mcp", MCP_HISTORY_FILE: "env_history"};

    const fromEnv = resolveConfig(parseArgs([]), env, "/work");
    const fromFlags = resolveConfig(
      parseArgs(["--url", "http://flag:2/mcp", "--history-file", "/tmp/h", "--format", "json", "-q", "--pretty"]),
      env,
      "/work"
    );

    expect(fromEnv.url).toBe("http://env:1/mcp");
    expect(fromEnv.historyFile).toBe("/work/env_history");
    expect(fromFlags).toMatchObject({
      url: "http://flag:2/mcp",
      historyFile: "/tmp/h",
      listingFormat: "json",
      quiet: true,
      pretty: true
    });
  });

  it("reads the stdio command, operation names and supervisor settings", () => {
    const config = resolveConfig(
      parseArgs([]),
      {
        MCP_STDIO_COMMAND: "bb  server.clj --stdio",
        MCP_EVAL_TOOL: "eval",
        MCP_DEBUG: "TRUE",
        MCP_HTTP_PORT: "3004",
        MCP_SERVER_DIR: "/srv/proxy"
      },
      "/work"
    );

    expect(config.stdioCommand).toEqual(["bb", "server.clj", "--stdio"]);
    expect(config.operations.evaluateOperation).toBe("eval");
    expect(config.debug).toBe(true);
    expect(config.supervisor.pidFile).toBe("/srv/proxy/server_3004.pid");
  });

  it("rejects an unknown listing format", () => {
    expect(() => resolveConfig(parseArgs(["--format", "yaml"]), {}, "/work")).toThrow(
      new ConfigError('Invalid --format "yaml": expected text, json or table')
    );
  });

  it("rejects a numeric setting that is not a positive integer", () => {
    expect(() => resolveConfig(parseArgs([]), {MCP_REQUEST_TIMEOUT_MS: "soon"}, "/work")).toThrow(
      'MCP_REQUEST_TIMEOUT_MS must be a positive integer, got "soon"'
    );
    expect(() => resolveConfig(parseArgs([]), {MCP_HISTORY_LIMIT: "0"}, "/work")).toThrow(ConfigError);
  });
});

describe("splitCommand", () => {
  it("splits on runs of whitespace", () => {
    expect(splitCommand("  bb   run  ")).toEqual(["bb", "run"]);
  });
});
