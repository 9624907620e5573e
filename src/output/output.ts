import { formatKeyValue, formatTable } from './format.js';
import type { OutputMode } from './mode.js';

export type Writer = { write(chunk: string): void };

export type ListView<T> = {
  /** Shown instead of an empty table, e.g. "No boards found." */
  empty: string;
  headers: readonly string[];
  row: (item: T) => readonly string[];
};

/**
 * Result rendering for one invocation. The mode is fixed at construction;
 * each method takes the value to emit as JSON plus what to show a person
 * instead.
 */
export class Output {
  readonly mode: OutputMode;
  private readonly stdout: Writer;

  constructor(stdout: Writer, mode: OutputMode) {
    this.stdout = stdout;
    this.mode = mode;
  }

  get structured(): boolean {
    return this.mode.kind === 'structured';
  }

  json(value: unknown): void {
    const pretty = this.mode.kind === 'structured' && this.mode.pretty;
    this.stdout.write(`${JSON.stringify(value ?? null, null, pretty ? 2 : undefined)}\n`);
  }

  write(text: string): void {
    this.stdout.write(text);
  }

  /** JSON of `value`, or whatever `display` writes. */
  value<T>(value: T, display: (value: T) => void): void {
    if (this.structured) {
      this.json(value);
      return;
    }
    display(value);
  }

  list<T>(items: readonly T[], view: ListView<T>): void {
    this.value(items, (rows) => {
      if (rows.length === 0) {
        this.stdout.write(`${view.empty}\n`);
        return;
      }
      this.stdout.write(formatTable(view.headers, rows.map(view.row)));
    });
  }

  detail<T>(value: T, pairs: (value: T) => ReadonlyArray<readonly [string, string]>): void {
    this.value(value, (v) => this.stdout.write(formatKeyValue(pairs(v))));
  }

  /** Confirmation-style output: a few plain lines at a terminal. */
  lines<T>(value: T, lines: (value: T) => readonly string[]): void {
    this.value(value, (v) => {
      for (const line of lines(v)) this.stdout.write(`${line}\n`);
    });
  }
}
