import {promises as fs} from "node:fs";
import path from "node:path";

export const DEFAULT_HISTORY_LIMIT = 500;

/** Evaluated code strings in submission order, oldest dropped past the limit. */
export class History {
  private readonly items: string[] = [];
  readonly limit: number;

  constructor(initial: string[] = [], limit = DEFAULT_HISTORY_LIMIT) {
    this.limit = limit;
    for (const entry of initial) {
      this.append(entry);
    }
  }

  append(code: string): void {
    this.items.push(code);
    if (this.items.length > this.limit) {
      this.items.splice(0, this.items.length - this.limit);
    }
  }

  entries(): readonly string[] {
    return this.items;
  }

  last(count: number): string[] {
    return count <= 0 ? [] : this.items.slice(-count);
  }

  latest(): string | undefined {
    return this.items[this.items.length - 1];
  }

  get size(): number {
    return this.items.length;
  }
}

export interface HistoryStore {
  load(): Promise<string[]>;
  save(entries: readonly string[]): Promise<void>;
}

/**
 * One JSON string per line so multi-line code survives the round trip.
 * A missing file loads as empty; unreadable lines are skipped.
 */
export class FileHistoryStore implements HistoryStore {
  constructor(readonly filePath: string) {}

  async load(): Promise<string[]> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf-8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return [];
      }
      throw error;
    }

    const entries: string[] = [];
    for (const line of raw.split("\n")) {
      if (!line.trim()) {
        continue;
      }
      try {
        const value: unknown = JSON.parse(line);
        if (typeof value === "string") {
          entries.push(value);
        }
      } catch {
        // lines written by other tools are plain text
        entries.push(line);
      }
    }
    return entries;
  }

  async save(entries: readonly string[]): Promise<void> {
    await fs.mkdir(path.dirname(path.resolve(this.filePath)), {recursive: true});
    const body = entries.map((entry) => JSON.stringify(entry)).join("\n");
    await fs.writeFile(this.filePath, body.length > 0 ? `${body}\n` : "", "utf-8");
  }
}
