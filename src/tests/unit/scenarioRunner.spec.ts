import {describe, expect, it} from "vitest";

import {CommandDispatcher} from "../../commands/dispatcher.js";
import {PlainFormatter} from "../../output/formatter.js";
import {History} from "../../repl/history.js";
import {Session} from "../../runtime/session.js";
import {buildNreplScenario} from "../../scenario/nreplScenario.js";
import {describeScenarioEvent} from "../../scenario/report.js";
import {ScenarioRunner, stepSucceeded, type ScenarioEvent, type ScenarioStep} from "../../scenario/runner.js";
import {FakeTransport, evalHandler, fakeServer, textResult} from "../helpers/fakeServer.js";

async function dispatcherFor(transport: FakeTransport) {
  const session = new Session(transport, {clientInfo: {name: "test", version: "0.0.0"}});
  await session.connect();
  return new CommandDispatcher(session, new History(), {evaluateOperation: "nrepl-eval", statusOperation: "nrepl-status"});
}

const step = (label: string, code: string): ScenarioStep => ({
  label,
  operationName: "nrepl-eval",
  arguments: {code},
  passPredicate: stepSucceeded
});

const threeSteps = [step("Add", "(+ 1 2 3)"), step("Broken", "(nope"), step("Multiply", "(* 6 7)")];

describe("ScenarioRunner", () => {
  it("runs every step in order and counts the passes", async () => {
    const transport = new FakeTransport(fakeServer({handlers: {"nrepl-eval": evalHandler}}));
    const runner = new ScenarioRunner(await dispatcherFor(transport));

    const result = await runner.run(threeSteps);

    expect(result).toEqual({
      passedCount: 2,
      totalCount: 3,
      perStep: [
        {label: "Add", passed: true},
        {label: "Broken", passed: false},
        {label: "Multiply", passed: true}
      ]
    });
    expect(transport.toolCalls().map((request) => request.params.arguments)).toEqual([
      {code: "(+ 1 2 3)"},
      {code: "(nope"},
      {code: "(* 6 7)"}
    ]);
  });

  it("gives the same result on a second run against the same backend", async () => {
    const transport = new FakeTransport(fakeServer({handlers: {"nrepl-eval": evalHandler}}));
    const runner = new ScenarioRunner(await dispatcherFor(transport));

    const first = await runner.run(threeSteps);
    const second = await runner.run(threeSteps);

    expect(second).toEqual(first);
  });

  it("narrates each step and the totals", async () => {
    const events: ScenarioEvent[] = [];
    const transport = new FakeTransport(fakeServer({handlers: {"nrepl-eval": evalHandler}}));
    const runner = new ScenarioRunner(await dispatcherFor(transport), (event) => events.push(event));

    await runner.run(threeSteps);

    expect(events.map((event) => event.type)).toEqual(["start", "step", "step", "step", "summary"]);
    expect(events[2]).toEqual({
      type: "step",
      label: "Broken",
      passed: false,
      detail: "❌ Evaluation error: cannot evaluate (nope"
    });
  });

  it("only reports the totals in summary mode", async () => {
    const events: ScenarioEvent[] = [];
    const transport = new FakeTransport(fakeServer({handlers: {"nrepl-eval": evalHandler}}));
    const runner = new ScenarioRunner(await dispatcherFor(transport), (event) => events.push(event));

    await runner.run(threeSteps, true);

    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({type: "summary", result: {passedCount: 2, totalCount: 3}});
  });

  it("fails a step whose operation is missing and keeps going", async () => {
    const events: ScenarioEvent[] = [];
    const transport = new FakeTransport(fakeServer({tools: [], handlers: {}}));
    const runner = new ScenarioRunner(await dispatcherFor(transport), (event) => events.push(event));

    const result = await runner.run([step("Add", "(+ 1 2 3)")]);

    expect(result.passedCount).toBe(0);
    expect(events[1]).toMatchObject({
      type: "step",
      passed: false,
      detail: "Tool 'nrepl-eval' not found. The tool catalog is empty."
    });
    expect(transport.toolCalls()).toHaveLength(0);
  });

  it("passes the default nREPL scenario against a healthy backend", async () => {
    const transport = new FakeTransport(
      fakeServer({
        handlers: {
          "nrepl-eval": evalHandler,
          "nrepl-status": () => ({result: textResult("Connected to nREPL at localhost:7888")}),
          "nrepl-test": () => ({result: textResult("✅ All checks passed")})
        }
      })
    );
    const scenario = buildNreplScenario({
      evaluateOperation: "nrepl-eval",
      statusOperation: "nrepl-status",
      testOperation: "nrepl-test"
    });

    const result = await new ScenarioRunner(await dispatcherFor(transport)).run(scenario);

    expect(result.passedCount).toBe(7);
    expect(result.perStep.map((entry) => entry.label)).toEqual([
      "Connection Status",
      "Basic Arithmetic",
      "String Operations",
      "Data Structures",
      "Function Definition",
      "Function Call",
      "Comprehensive Health Test"
    ]);
  });
});

describe("describeScenarioEvent", () => {
  const formatter = new PlainFormatter();

  it("renders steps with check marks", () => {
    expect(describeScenarioEvent({type: "step", label: "Add", passed: true}, formatter)).toEqual(["✅ ✓ Add"]);
    expect(describeScenarioEvent({type: "step", label: "Broken", passed: false, detail: "boom"}, formatter)).toEqual([
      "❌ ✗ Broken: boom"
    ]);
  });

  it("renders the totals with the failure count", () => {
    const result = {passedCount: 2, totalCount: 3, perStep: []};

    expect(describeScenarioEvent({type: "summary", result}, formatter)).toEqual([
      "",
      "📊 Test Results: 2/3 passed",
      "⚠️  1 tests failed"
    ]);
  });
});
