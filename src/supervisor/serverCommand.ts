import {describeError} from "../errors.js";
import {renderListing} from "../output/listing.js";
import type {ServerAction} from "../parseArgs.js";
import type {ClientRuntime} from "../runtime/client.js";
import {printScenario} from "../scenario/report.js";
import {ScenarioRunner, allPassed} from "../scenario/runner.js";
import type {ProcessSupervisor, StartOutcome} from "./processSupervisor.js";

export type ServerCommandRuntime = Pick<ClientRuntime, "config" | "printer" | "session" | "dispatcher" | "scenario">;

/** `server <action>` from the command line. Resolves to the exit code. */
export async function runServerAction(
  action: ServerAction,
  supervisor: ProcessSupervisor,
  runtime: ServerCommandRuntime
): Promise<number> {
  const {printer} = runtime;
  const {port} = supervisor.config;

  switch (action) {
    case "start":
      printer.info(`Starting MCP-nREPL server on port ${port}...`);
      return reportStart(await supervisor.start(), supervisor, runtime);

    case "stop": {
      const outcome = await supervisor.stop();
      switch (outcome.kind) {
        case "not-running":
          printer.info("No server process found");
          return 0;
        case "gone":
          printer.warn(`Server process ${outcome.pid} was no longer running`);
          return 0;
        case "stopped":
          printer.success(
            outcome.forced ? `Force stopped server (PID: ${outcome.pid})` : `Server stopped gracefully (PID: ${outcome.pid})`
          );
          return 0;
      }
    }

    case "restart":
      printer.info("Restarting server...");
      return reportStart(await supervisor.restart(), supervisor, runtime);

    case "status": {
      const status = await supervisor.status();
      printer.result(printer.formatter.heading("📊 Server Status:"));
      printer.result(`   Port: ${status.port}`);
      printer.result(`   PID: ${status.pid ?? "Not found"}`);
      printer.result(`   HTTP Health: ${status.responding ? "✅ Responding" : "❌ Not responding"}`);
      if (status.backendConnected !== undefined) {
        printer.result(`   nREPL Connected: ${status.backendConnected ? "✅" : "❌"}`);
      }
      return status.responding ? 0 : 1;
    }

    case "health":
      return whileConnected(supervisor, runtime, () => checkHealth(supervisor, runtime));

    case "test":
      return whileConnected(supervisor, runtime, async () => ((await runScenario(runtime)) ? 0 : 1));

    case "tools":
      return whileConnected(supervisor, runtime, async () => listTools(runtime));

    case "run":
      return runWorkflow(supervisor, runtime);
  }
}

/** Start, scenario, health check; stops at the first failure. */
async function runWorkflow(supervisor: ProcessSupervisor, runtime: ServerCommandRuntime): Promise<number> {
  const {printer} = runtime;
  printer.narrate("🚀 Full test workflow...");
  if (reportStart(await supervisor.start(), supervisor, runtime) !== 0) {
    printer.error("Failed to start server");
    return 1;
  }

  return whileConnected(supervisor, runtime, async () => {
    if (!(await runScenario(runtime))) {
      printer.error("Basic tests failed");
      return 1;
    }
    if ((await checkHealth(supervisor, runtime)) !== 0) {
      return 1;
    }
    printer.success("All tests passed! Server is ready.");
    return 0;
  });
}

function reportStart(outcome: StartOutcome, supervisor: ProcessSupervisor, {printer}: ServerCommandRuntime): number {
  switch (outcome.kind) {
    case "already-running":
      printer.success(`Server already running on port ${supervisor.config.port}`);
      return 0;
    case "started":
      printer.success(`Server started on port ${supervisor.config.port} (PID: ${outcome.pid})`);
      printer.narrate(`📋 Logs: ${supervisor.config.logFile}`);
      printer.narrate(`🔗 MCP endpoint: ${supervisor.mcpUrl}`);
      printer.narrate(`💚 Health check: ${supervisor.healthUrl}`);
      return 0;
    case "failed":
      printer.error(outcome.reason);
      return 1;
  }
}

/** Runs `work` over a connected session to the managed server, then closes it. */
async function whileConnected(
  supervisor: ProcessSupervisor,
  runtime: ServerCommandRuntime,
  work: () => Promise<number>
): Promise<number> {
  const {printer, session} = runtime;
  if (!(await supervisor.isRunning())) {
    printer.error("Server not running. Start server first.");
    return 1;
  }

  try {
    const connection = await session.connect();
    if (!connection.connected) {
      printer.error(`Connection failed: ${describeError(connection.error)}`);
      return 1;
    }
    return await work();
  } finally {
    await session.close();
  }
}

async function checkHealth(supervisor: ProcessSupervisor, runtime: ServerCommandRuntime): Promise<number> {
  const {printer} = runtime;
  printer.info("Running comprehensive health check...");
  if (await supervisor.healthCheck(runtime.dispatcher, runtime.config.operations.healthOperation)) {
    printer.success("Health check passed");
    return 0;
  }
  printer.error("Health check failed");
  return 1;
}

async function runScenario({dispatcher, printer, scenario}: ServerCommandRuntime): Promise<boolean> {
  return allPassed(await new ScenarioRunner(dispatcher, printScenario(printer)).run(scenario));
}

function listTools({config, printer, session}: ServerCommandRuntime): number {
  if (session.catalog.size === 0) {
    printer.error("No tools available");
    return 1;
  }
  renderListing(session.catalog, config.listingFormat, printer.formatter).forEach((line) => printer.result(line));
  return 0;
}
