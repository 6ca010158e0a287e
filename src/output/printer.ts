import type {OutputFormatter} from "./formatter.js";

export type WriteLine = (line: string) => void;

export interface PrinterOptions {
  formatter: OutputFormatter;
  quiet?: boolean;
  stdout?: WriteLine;
  stderr?: WriteLine;
}

/**
 * Narration (info, success, headings) is dropped in quiet mode. Results go to
 * stdout and errors to stderr either way.
 */
export class Printer {
  readonly formatter: OutputFormatter;
  readonly quiet: boolean;
  private readonly stdout: WriteLine;
  private readonly stderr: WriteLine;

  constructor({
    formatter,
    quiet = false,
    stdout = (line) => process.stdout.write(`${line}\n`),
    stderr = (line) => process.stderr.write(`${line}\n`)
  }: PrinterOptions) {
    this.formatter = formatter;
    this.quiet = quiet;
    this.stdout = stdout;
    this.stderr = stderr;
  }

  narrate(line: string): void {
    if (!this.quiet) {
      this.stdout(line);
    }
  }

  info(message: string): void {
    this.narrate(this.formatter.info(message));
  }

  success(message: string): void {
    this.narrate(this.formatter.success(message));
  }

  warn(message: string): void {
    this.narrate(this.formatter.warn(message));
  }

  error(message: string): void {
    this.stderr(this.formatter.error(message));
  }

  result(text: string): void {
    this.stdout(text);
  }
}
