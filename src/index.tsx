#!/usr/bin/env node
import "dotenv/config";
import React from "react";
import {render} from "ink";

import App from "./app.js";
import {runOneShot, selectAction} from "./commands/oneShot.js";
import {resolveConfig, type ClientConfig} from "./config.js";
import {ConfigError, describeError} from "./errors.js";
import {createLogger} from "./logger.js";
import {selectFormatter} from "./output/formatter.js";
import {HELP_TEXT, parseArgs} from "./parseArgs.js";
import {ReplController} from "./repl/controller.js";
import {runLineLoop} from "./repl/lineLoop.js";
import {createClientRuntime, type ClientRuntime} from "./runtime/client.js";
import {ProcessSupervisor} from "./supervisor/processSupervisor.js";
import {runServerAction} from "./supervisor/serverCommand.js";

const parsed = parseArgs(process.argv.slice(2));

if (parsed.helpRequested) {
  // eslint-disable-next-line no-console
  console.log(HELP_TEXT);
  process.exit(0);
}

if (parsed.unknown.length > 0) {
  // eslint-disable-next-line no-console
  console.warn(`Ignoring unknown arguments: ${parsed.unknown.join(", ")}`);
}

let config: ClientConfig;
try {
  config = resolveConfig(parsed);
} catch (error) {
  if (!(error instanceof ConfigError)) {
    throw error;
  }
  // eslint-disable-next-line no-console
  console.error(`❌ ${error.message}`);
  process.exit(1);
}

const logger = createLogger({debug: config.debug});
const runtime = createClientRuntime(config, selectFormatter(), logger);

async function runInteractive(client: ClientRuntime): Promise<number> {
  const {printer, session} = client;
  printer.info(`Connecting to MCP server: ${session.endpoint}`);
  const connection = await session.connect();
  if (!connection.connected) {
    printer.error(`Connection failed: ${describeError(connection.error)}`);
    await session.close();
    return 1;
  }

  const notices = [`Connected to ${connection.serverInfo?.name ?? session.endpoint} (${session.catalog.size} tools)`];
  if (connection.catalogError) {
    notices.push(`Could not list tools: ${describeError(connection.catalogError)}`);
  }

  const controller = new ReplController(client);
  await controller.open();

  try {
    if (process.stdin.isTTY) {
      const instance = render(<App controller={controller} runtime={client} notices={notices} />, {exitOnCtrlC: false});
      await instance.waitUntilExit();
    } else {
      notices.forEach((notice) => printer.narrate(notice));
      await runLineLoop(controller, {write: (line) => printer.result(line)});
    }
  } finally {
    await controller.close();
    await session.close();
  }
  return 0;
}

async function main(): Promise<number> {
  if (parsed.server) {
    const supervisor = new ProcessSupervisor(config.supervisor, {logger});
    return runServerAction(parsed.server, supervisor, runtime);
  }
  if (parsed.interactive) {
    return runInteractive(runtime);
  }
  return runOneShot(selectAction(parsed), runtime);
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error(describeError(error));
    process.exitCode = 1;
  });
