/**
 * Console styling shared by the LLM and report loggers
 */
import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import cliProgress from 'cli-progress';
import figures from 'figures';

// ═══════════════════════════════════════════════════════════════════════════
// THEME
// ═══════════════════════════════════════════════════════════════════════════

export const theme = {
  success: chalk.green,
  error: chalk.red,
  warning: chalk.yellow,

  bold: chalk.bold,
  dim: chalk.dim,

  check: chalk.green(figures.tick),
  cross: chalk.red(figures.cross),
  warn: chalk.yellow(figures.warning),
  bullet: chalk.dim(figures.bullet),
  arrow: chalk.cyan(figures.arrowRight),

  separator: chalk.dim(' · '),
  divider: (label: string, width = 60) => {
    const prefix = `━━━ ${label} `;
    const remaining = Math.max(0, width - prefix.length);
    return chalk.cyan.dim(prefix + '━'.repeat(remaining));
  },
};

// ═══════════════════════════════════════════════════════════════════════════
// SPINNER MANAGER
// ═══════════════════════════════════════════════════════════════════════════

let activeSpinner: Ora | null = null;

export const spinner = {
  start(text: string): Ora {
    if (activeSpinner) {
      activeSpinner.stop();
    }
    activeSpinner = ora({
      text,
      spinner: 'dots',
      indent: 4,
    }).start();
    return activeSpinner;
  },

  succeed(text?: string): void {
    if (activeSpinner) {
      activeSpinner.succeed(text);
      activeSpinner = null;
    }
  },

  fail(text?: string): void {
    if (activeSpinner) {
      activeSpinner.fail(text);
      activeSpinner = null;
    }
  },

  stop(): void {
    if (activeSpinner) {
      activeSpinner.stop();
      activeSpinner = null;
    }
  },
};

// ═══════════════════════════════════════════════════════════════════════════
// PROGRESS BAR
// ═══════════════════════════════════════════════════════════════════════════

export interface ProgressTracker {
  start(total: number): void;
  update(current: number): void;
  stop(): void;
}

export function createProgressTracker(label: string): ProgressTracker {
  let bar: cliProgress.SingleBar | null = null;
  let startTime = 0;

  return {
    start(total: number) {
      spinner.stop();

      startTime = Date.now();
      bar = new cliProgress.SingleBar({
        format: `    {bar} {percentage}%  {value}/{total} ${label}  {duration_formatted}`,
        barCompleteChar: '█',
        barIncompleteChar: '░',
        barsize: 20,
        hideCursor: true,
        clearOnComplete: false,
        stopOnComplete: false,
        fps: 10,
      });
      bar.start(total, 0, { duration_formatted: '0s' });
    },

    update(current: number) {
      if (bar) {
        bar.update(current, { duration_formatted: formatDuration(Date.now() - startTime) });
      }
    },

    stop() {
      if (bar) {
        bar.update(bar.getTotal(), { duration_formatted: formatDuration(Date.now() - startTime) });
        bar.stop();
        bar = null;
      }
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// FORMATTERS
// ═══════════════════════════════════════════════════════════════════════════

export function formatDuration(ms: number): string {
  const totalSeconds = Math.round(ms / 1000);
  if (totalSeconds < 60) return `${totalSeconds}s`;
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return seconds > 0 ? `${minutes}m ${seconds}s` : `${minutes}m`;
}
