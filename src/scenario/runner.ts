import {describeError} from "../errors.js";
import {FAILURE_MARKER, type CommandDispatcher} from "../commands/dispatcher.js";
import type {Exchange} from "../runtime/transport.js";
import {contentTexts, type ToolArguments} from "../types/mcp.js";

export interface ScenarioStep {
  readonly label: string;
  readonly operationName: string;
  readonly arguments: ToolArguments;
  readonly passPredicate: (exchange: Exchange) => boolean;
}

export interface StepResult {
  label: string;
  passed: boolean;
}

export interface ScenarioResult {
  passedCount: number;
  totalCount: number;
  perStep: StepResult[];
}

export type ScenarioEvent =
  | {type: "start"; total: number}
  | {type: "step"; label: string; passed: boolean; detail?: string}
  | {type: "summary"; result: ScenarioResult};

export type ScenarioListener = (event: ScenarioEvent) => void;

/**
 * Default pass check: the exchange carries no error and its first text item
 * does not open with the backend's failure marker.
 */
export function stepSucceeded(exchange: Exchange): boolean {
  if (exchange.error) {
    return false;
  }
  const first = contentTexts(exchange.result)?.[0];
  return first === undefined || !first.startsWith(FAILURE_MARKER);
}

export function allPassed(result: ScenarioResult): boolean {
  return result.passedCount === result.totalCount;
}

export class ScenarioRunner {
  constructor(
    private readonly dispatcher: CommandDispatcher,
    private readonly listener: ScenarioListener = () => undefined
  ) {}

  /** Runs every step in order; a failed step never stops the run. */
  async run(steps: readonly ScenarioStep[], summaryOnly = false): Promise<ScenarioResult> {
    const perStep: StepResult[] = [];
    if (!summaryOnly) {
      this.listener({type: "start", total: steps.length});
    }

    for (const step of steps) {
      const {passed, detail} = await this.runStep(step);
      perStep.push({label: step.label, passed});
      if (!summaryOnly) {
        this.listener({type: "step", label: step.label, passed, detail});
      }
    }

    const result: ScenarioResult = {
      passedCount: perStep.filter((step) => step.passed).length,
      totalCount: steps.length,
      perStep
    };
    this.listener({type: "summary", result});
    return result;
  }

  private async runStep(step: ScenarioStep): Promise<{passed: boolean; detail?: string}> {
    let exchange: Exchange;
    try {
      ({exchange} = await this.dispatcher.invoke(step.operationName, step.arguments));
    } catch (error) {
      return {passed: false, detail: describeError(error)};
    }

    const passed = step.passPredicate(exchange);
    if (passed) {
      return {passed};
    }
    if (exchange.error) {
      return {passed, detail: describeError(exchange.error)};
    }
    return {passed, detail: contentTexts(exchange.result)?.[0]};
  }
}
