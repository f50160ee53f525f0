/**
 * Progress Indicator
 *
 * A single self-overwriting line on stderr showing how many target
 * objects have been checked.
 */

export interface ProgressIndicator {
  start(total: number): void;
  tick(): void;
  stop(): void;
}

/**
 * Writable stream subset the terminal indicator needs
 */
export interface ProgressStream {
  isTTY?: boolean;
  write(chunk: string): unknown;
}

export class TerminalProgress implements ProgressIndicator {
  private total = 0;
  private done = 0;
  private active = false;

  constructor(private readonly stream: ProgressStream = process.stderr) {}

  start(total: number): void {
    this.total = total;
    this.done = 0;
    this.active = true;
    this.render();
  }

  tick(): void {
    if (!this.active) return;
    this.done = Math.min(this.done + 1, this.total);
    this.render();
  }

  stop(): void {
    if (!this.active) return;
    this.active = false;
    this.stream.write('\n');
  }

  private render(): void {
    const percent = this.total > 0 ? Math.floor((this.done / this.total) * 100) : 100;
    this.stream.write(`\rChecked ${this.done}/${this.total} objects (${percent}%)`);
  }
}

/**
 * Progress is shown only for interactive, non-quiet runs with a known total
 */
export function createProgress(options: {
  quiet: boolean;
  total: number;
  stream?: ProgressStream;
}): ProgressIndicator | undefined {
  const stream = options.stream ?? process.stderr;
  if (options.quiet || stream.isTTY !== true || options.total <= 0) {
    return undefined;
  }
  return new TerminalProgress(stream);
}
