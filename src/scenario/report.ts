import type {OutputFormatter} from "../output/formatter.js";
import type {Printer} from "../output/printer.js";
import type {ScenarioEvent, ScenarioListener} from "./runner.js";

export function describeScenarioEvent(event: ScenarioEvent, formatter: OutputFormatter): string[] {
  switch (event.type) {
    case "start":
      return [formatter.info(`Running ${event.total} scenario steps...`)];
    case "step":
      return event.passed
        ? [formatter.success(`✓ ${event.label}`)]
        : [formatter.error(`✗ ${event.label}${event.detail ? `: ${event.detail}` : ""}`)];
    case "summary": {
      const {passedCount, totalCount} = event.result;
      const lines = ["", formatter.heading(`📊 Test Results: ${passedCount}/${totalCount} passed`)];
      if (passedCount === totalCount) {
        lines.push(formatter.success("All tests passed! 🎉"));
      } else {
        lines.push(formatter.warn(`${totalCount - passedCount} tests failed`));
      }
      return lines;
    }
  }
}

/** Step lines are narration; totals print as results so they survive `--quiet`. */
export function printScenario(printer: Printer): ScenarioListener {
  return (event) => {
    const lines = describeScenarioEvent(event, printer.formatter);
    lines.forEach((line) => (event.type === "summary" ? printer.result(line) : printer.narrate(line)));
  };
}
