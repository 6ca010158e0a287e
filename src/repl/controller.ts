import {parseCommand} from "../chat/commandParser.js";
import {executeCommand, type CommandExecutionContext, type CommandOutput} from "../commands/executor.js";
import {describeError} from "../errors.js";
import type {Logger} from "../logger.js";
import {getCommandSuggestions, type CommandOption} from "../utils/commands.js";
import type {HistoryStore} from "./history.js";

export type ReplState = "awaiting-input" | "dispatching" | "closed";

export interface ReplControllerDeps extends CommandExecutionContext {
  historyStore: HistoryStore;
  logger: Logger;
}

/**
 * The interactive loop's state machine, shared by the terminal UI and the
 * line-reader driver. One line is handled at a time.
 */
export class ReplController {
  private current: ReplState = "awaiting-input";
  private closing?: Promise<void>;

  constructor(private readonly deps: ReplControllerDeps) {}

  get state(): ReplState {
    return this.current;
  }

  /** Load persisted history. A missing or unreadable file leaves history empty. */
  async open(): Promise<void> {
    try {
      const entries = await this.deps.historyStore.load();
      for (const entry of entries) {
        this.deps.history.append(entry);
      }
    } catch (error) {
      this.deps.logger.warn(`Could not load history: ${describeError(error)}`);
    }
  }

  async submit(line: string): Promise<CommandOutput> {
    if (this.current === "closed") {
      return {lines: [], shouldExit: true};
    }
    if (this.current === "dispatching") {
      return {lines: [this.deps.formatter.warn("Still waiting for the previous command")], isError: true};
    }

    const parsed = parseCommand(line);
    if (parsed.kind === "empty") {
      return {lines: []};
    }

    this.current = "dispatching";
    let output: CommandOutput;
    try {
      output = await executeCommand(parsed, this.deps);
    } finally {
      this.current = "awaiting-input";
    }

    if (output.shouldExit) {
      await this.close();
    }
    return output;
  }

  /** Persist history and move to `closed`. Safe to call more than once. */
  close(): Promise<void> {
    this.closing ??= this.persist();
    return this.closing;
  }

  completions(prefix: string): string[] {
    return getCommandSuggestions(prefix, this.deps.session.catalog).map((option) => option.command);
  }

  suggestions(input: string): CommandOption[] {
    return getCommandSuggestions(input, this.deps.session.catalog);
  }

  /** Evaluated code, oldest first, as lines that can be re-submitted. */
  recallLines(): string[] {
    return this.deps.history.entries().map((code) => `eval ${code}`);
  }

  private async persist(): Promise<void> {
    this.current = "closed";
    try {
      await this.deps.historyStore.save(this.deps.history.entries());
    } catch (error) {
      this.deps.logger.warn(`Could not save history: ${describeError(error)}`);
    }
  }
}
