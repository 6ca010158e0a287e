import {createInterface, type Completer} from "node:readline";
import type {Readable, Writable} from "node:stream";

import type {ReplController} from "./controller.js";

export interface LineLoopOptions {
  input?: Readable;
  output?: Writable;
  prompt?: string;
  /** Where command output goes; defaults to `output`. */
  write?: (line: string) => void;
}

/**
 * Plain line-reader driver for the interactive loop, used when the terminal
 * UI can't take over stdin. Lines are handled strictly one after another.
 */
export async function runLineLoop(controller: ReplController, options: LineLoopOptions = {}): Promise<void> {
  const input = options.input ?? process.stdin;
  const output = options.output ?? process.stdout;
  const write = options.write ?? ((line: string) => output.write(`${line}\n`));
  const terminal = "isTTY" in output && output.isTTY === true;

  const completer: Completer = (line) => {
    const word = line.slice(line.search(/\S*$/));
    return [controller.completions(line), word];
  };

  const rl = createInterface({
    input,
    output,
    terminal,
    completer,
    history: [...controller.recallLines()].reverse(),
    historySize: 500
  });

  // Interrupt while waiting for input ends the loop; an in-flight command still finishes
  rl.on("SIGINT", () => rl.close());

  rl.setPrompt(options.prompt ?? "nrepl> ");
  rl.prompt();

  try {
    for await (const line of rl) {
      const result = await controller.submit(line);
      if (result.clearScreen && terminal) {
        output.write("\x1b[2J\x1b[3J\x1b[H");
      }
      result.lines.forEach((entry) => write(entry));
      if (result.shouldExit || controller.state === "closed") {
        break;
      }
      rl.prompt();
    }
  } finally {
    rl.close();
    await controller.close();
  }
}
