import type {ToolArguments} from "../types/mcp.js";
import {stepSucceeded, type ScenarioStep} from "./runner.js";

export interface ScenarioOperations {
  evaluateOperation: string;
  statusOperation: string;
  testOperation: string;
}

const step = (label: string, operationName: string, args: ToolArguments = {}): ScenarioStep => ({
  label,
  operationName,
  arguments: args,
  passPredicate: stepSucceeded
});

/** Smoke run against a live nREPL backend: status, a few evaluations, then the server's own health test. */
export function buildNreplScenario({evaluateOperation, statusOperation, testOperation}: ScenarioOperations): ScenarioStep[] {
  const evaluate = (label: string, code: string) => step(label, evaluateOperation, {code});
  return [
    step("Connection Status", statusOperation),
    evaluate("Basic Arithmetic", "(+ 1 2 3)"),
    evaluate("String Operations", '(str "Hello" " " "World")'),
    evaluate("Data Structures", "(count [1 2 3 4 5])"),
    evaluate("Function Definition", "(defn test-fn [x] (* x 2))"),
    evaluate("Function Call", "(test-fn 21)"),
    step("Comprehensive Health Test", testOperation)
  ];
}
