import pc from "picocolors";

type Colors = ReturnType<typeof pc.createColors>;

/**
 * Styling for everything the client prints. Picked once at startup and
 * passed to whatever produces output.
 */
export interface OutputFormatter {
  readonly enhanced: boolean;
  success(message: string): string;
  error(message: string): string;
  info(message: string): string;
  warn(message: string): string;
  heading(message: string): string;
  accent(message: string): string;
  muted(message: string): string;
  panel(title: string, body: string): string;
}

export class PlainFormatter implements OutputFormatter {
  readonly enhanced = false;

  success(message: string): string {
    return `✅ ${message}`;
  }

  error(message: string): string {
    return `❌ ${message}`;
  }

  info(message: string): string {
    return `ℹ️  ${message}`;
  }

  warn(message: string): string {
    return `⚠️  ${message}`;
  }

  heading(message: string): string {
    return message;
  }

  accent(message: string): string {
    return message;
  }

  muted(message: string): string {
    return message;
  }

  panel(_title: string, body: string): string {
    return body;
  }
}

export class EnhancedFormatter implements OutputFormatter {
  readonly enhanced = true;
  private readonly colors: Colors;

  constructor(colors: Colors = pc) {
    this.colors = colors;
  }

  success(message: string): string {
    return this.colors.bold(this.colors.green(`✅ ${message}`));
  }

  error(message: string): string {
    return this.colors.bold(this.colors.red(`❌ ${message}`));
  }

  info(message: string): string {
    return this.colors.blue(`ℹ️  ${message}`);
  }

  warn(message: string): string {
    return this.colors.yellow(`⚠️  ${message}`);
  }

  heading(message: string): string {
    return this.colors.bold(message);
  }

  accent(message: string): string {
    return this.colors.cyan(message);
  }

  muted(message: string): string {
    return this.colors.dim(message);
  }

  panel(title: string, body: string): string {
    const width = Math.max(title.length + 6, ...body.split("\n").map((line) => line.length), 20);
    const top = `── ${title} ${"─".repeat(Math.max(width - title.length - 4, 2))}`;
    return [this.colors.dim(top), body, this.colors.dim("─".repeat(top.length))].join("\n");
  }
}

export interface FormatterCapabilities {
  colorSupported: boolean;
}

export function detectCapabilities(): FormatterCapabilities {
  return {colorSupported: pc.isColorSupported};
}

export function selectFormatter({colorSupported}: FormatterCapabilities = detectCapabilities()): OutputFormatter {
  return colorSupported ? new EnhancedFormatter() : new PlainFormatter();
}
