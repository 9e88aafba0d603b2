import chalk from 'chalk';
import ora from 'ora';
import { ProgressState } from '../types';

export interface ProgressOptions {
  /** Suppress the spinner. Failure lines still go through `log`. */
  silent?: boolean;
  log?: (line: string) => void;
}

/**
 * Counts completed conversions against a total that may still be growing
 * while files are being discovered. Callers all run on the event loop, so
 * plain counters are enough.
 */
export class ProgressReporter {
  private total: number;
  private completed = 0;
  private finalized = false;
  private readonly failureMessages: string[] = [];
  private readonly spinner: ReturnType<typeof ora>;
  private readonly log: (line: string) => void;

  constructor(total = 0, options: ProgressOptions = {}) {
    this.total = total;
    this.log = options.log ?? ((line) => console.error(line));
    this.spinner = ora({ text: this.render(), isSilent: options.silent ?? false });
  }

  get state(): ProgressState {
    return { total: this.total, completed: this.completed };
  }

  get failures(): readonly string[] {
    return this.failureMessages;
  }

  start(): void {
    this.spinner.start(this.render());
  }

  addTotal(count = 1): void {
    if (this.finalized) {
      throw new RangeError('Total is already final');
    }
    this.total += count;
    this.update();
  }

  setTotal(total: number): void {
    if (total < this.completed) {
      throw new RangeError(`Total ${total} is below completed count ${this.completed}`);
    }
    this.total = total;
    this.finalized = true;
    this.update();
  }

  increment(): void {
    if (this.finalized && this.completed >= this.total) {
      throw new RangeError(`Completed count would exceed total ${this.total}`);
    }
    this.completed += 1;
    if (this.completed > this.total) {
      this.total = this.completed;
    }
    this.update();
  }

  reportFailure(message: string): void {
    this.failureMessages.push(message);
    this.print(`${chalk.red('✗')} ${message}`);
  }

  /** Write a line above the spinner. */
  print(line: string): void {
    if (this.spinner.isSpinning) {
      this.spinner.clear();
      this.log(line);
      this.spinner.render();
    } else {
      this.log(line);
    }
  }

  finish(): void {
    const failed = this.failureMessages.length;
    if (failed === 0) {
      this.spinner.succeed(`Converted ${this.completed}/${this.total} files`);
    } else {
      this.spinner.warn(`Converted ${this.completed}/${this.total} files, ${chalk.red(`${failed} failed`)}`);
    }
  }

  private update(): void {
    this.spinner.text = this.render();
  }

  private render(): string {
    return `Converting ${this.completed}/${this.total}`;
  }
}
