/**
 * Progress Display
 *
 * Redraws the running encode jobs under an ora spinner on a fixed
 * interval. Reads registry snapshots only; jobs never touch the display.
 */

import ora, { type Ora } from 'ora';
import { formatDuration } from '@hls-ladder/utils';
import type { ProgressRegistry, ProgressTaskSnapshot } from '@hls-ladder/processing';

const BAR_WIDTH = 20;

export interface ProgressDisplayOptions {
  intervalMs?: number;
  /** Defaults to ora's own TTY detection */
  enabled?: boolean;
}

export class ProgressDisplay {
  private spinner: Ora | null = null;
  private timer: NodeJS.Timeout | null = null;
  private title = '';

  constructor(
    private readonly registry: ProgressRegistry,
    private readonly options: ProgressDisplayOptions = {}
  ) {}

  start(title: string): void {
    this.stop();
    this.title = title;
    this.spinner = ora({
      text: title,
      stream: process.stderr,
      discardStdin: false,
      isEnabled: this.options.enabled,
    }).start();
    this.timer = setInterval(() => this.render(), this.options.intervalMs ?? 250);
  }

  render(): void {
    if (!this.spinner) return;
    const lines = this.registry.snapshot().map(formatTaskLine);
    this.spinner.text = [this.title, ...lines.map(line => `  ${line}`)].join('\n');
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.spinner) {
      this.spinner.stop();
      this.spinner = null;
    }
  }
}

/**
 * One task as `<description> <bar> <percent>% <done>/<total> [<speed>x]`
 */
export function formatTaskLine(task: ProgressTaskSnapshot): string {
  const ratio = task.total > 0 ? Math.min(task.completed / task.total, 1) : 0;
  const filled = Math.round(ratio * BAR_WIDTH);
  const bar = '█'.repeat(filled) + '░'.repeat(BAR_WIDTH - filled);
  const percent = `${Math.floor(ratio * 100)}`.padStart(3);
  const times = `${formatDuration(task.completed)}/${formatDuration(task.total)}`;
  const speed = task.speed !== undefined ? ` ${task.speed.toFixed(2)}x` : '';

  return `${task.description} ${bar} ${percent}% ${times}${speed}`;
}
