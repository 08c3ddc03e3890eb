/**
 * Progress Display
 *
 * ora spinner per run phase, driven by coordinator events.
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';
import type { MigrationEvent } from '../migrate/coordinator.js';
import type { RunPhase } from '../migrate/types.js';

// ─── Types ───────────────────────────────────────────────────

export interface ProgressDisplayOptions {
  /** Disable colors */
  noColor?: boolean;
  /** Print every recorded failure as it happens */
  verbose?: boolean;
}

// ─── Phase Icons & Colors ────────────────────────────────────

const PHASE_CONFIG: Record<RunPhase, { icon: string; label: string }> = {
  pending: { icon: '○', label: 'Pending' },
  fetching: { icon: '📤', label: 'Fetching' },
  caching: { icon: '💾', label: 'Caching' },
  grouping: { icon: '🗂', label: 'Grouping' },
  exporting: { icon: '📦', label: 'Preparing XHTML export' },
  transforming: { icon: '🔄', label: 'Transforming' },
  importing: { icon: '📥', label: 'Importing' },
  done: { icon: '✓', label: 'Done' },
  aborted: { icon: '✗', label: 'Aborted' },
};

const GROUP_STATUS_ICON = {
  imported: chalk.green('✓'),
  partial: chalk.yellow('◐'),
  failed: chalk.red('✗'),
  skipped: chalk.dim('↷'),
} as const;

// ─── Progress Display Class ──────────────────────────────────

export class ProgressDisplay {
  private spinner: Ora | null = null;
  private currentPhase: RunPhase = 'pending';
  private phaseStartTime = 0;
  private readonly verbose: boolean;
  private readonly noColor: boolean;

  constructor(options: ProgressDisplayOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.noColor = options.noColor ?? false;
  }

  /**
   * Handle coordinator events
   */
  handleEvent = (event: MigrationEvent): void => {
    switch (event.type) {
      case 'phase:start':
        if (event.phase) this.startPhase(event.phase, event.message);
        break;
      case 'phase:complete':
        if (event.phase) this.completePhase(event.phase, event.message);
        break;
      case 'progress':
        this.updateProgress(event.progress, event.message);
        break;
      case 'group:complete':
        if (event.group) {
          this.log(`  ${GROUP_STATUS_ICON[event.group.status]} ${event.message ?? event.group.projectId}`);
        }
        break;
      case 'failure':
        if (this.verbose && event.failure) {
          this.log(chalk.yellow(`  ⚠ [${event.failure.scope}] ${event.failure.message}`));
        }
        break;
      case 'complete':
        this.stop();
        break;
      case 'error':
        this.failPhase(event.error?.message ?? 'Unknown error');
        break;
    }
  };

  startPhase(phase: RunPhase, message?: string): void {
    if (this.spinner) {
      this.spinner.stop();
    }

    this.currentPhase = phase;
    this.phaseStartTime = Date.now();

    const config = PHASE_CONFIG[phase];
    this.spinner = ora({
      text: `${config.icon} ${message ?? `${config.label}...`}`,
      color: this.noColor ? undefined : 'cyan',
    }).start();
  }

  completePhase(phase: RunPhase, message?: string): void {
    const elapsed = this.formatElapsed(Date.now() - this.phaseStartTime);
    const config = PHASE_CONFIG[phase];

    if (this.spinner) {
      this.spinner.succeed(`${config.icon} ${message ?? config.label} ${chalk.dim(`(${elapsed})`)}`);
      this.spinner = null;
    }
  }

  failPhase(errorMessage: string): void {
    if (this.spinner) {
      this.spinner.fail(`Failed: ${errorMessage}`);
      this.spinner = null;
    }
  }

  updateProgress(progress?: number, message?: string): void {
    if (!this.spinner) return;

    const config = PHASE_CONFIG[this.currentPhase];
    let text = message ?? config.label;

    if (progress !== undefined) {
      text = `${text} ${this.createProgressBar(progress)} ${Math.round(progress)}%`;
    }

    this.spinner.text = `${config.icon} ${text}`;
  }

  /**
   * Log a message (preserving spinner)
   */
  log(message: string): void {
    if (this.spinner) {
      this.spinner.stop();
      console.log(message);
      this.spinner.start();
    } else {
      console.log(message);
    }
  }

  stop(): void {
    if (this.spinner) {
      this.spinner.stop();
      this.spinner = null;
    }
  }

  // ─── Helpers ─────────────────────────────────────────────────

  private createProgressBar(progress: number, width = 20): string {
    const filled = Math.max(0, Math.min(width, Math.round((progress / 100) * width)));
    const bar = '█'.repeat(filled) + '░'.repeat(width - filled);
    return this.noColor ? `[${bar}]` : chalk.cyan(`[${bar}]`);
  }

  private formatElapsed(ms: number): string {
    if (ms < 1000) return `${ms}ms`;
    if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
    const minutes = Math.floor(ms / 60000);
    const seconds = Math.round((ms % 60000) / 1000);
    return `${minutes}m ${seconds}s`;
  }
}

// ─── Convenience Functions ───────────────────────────────────

export function success(message: string): void {
  console.log(chalk.green('✓') + ' ' + message);
}

export function warning(message: string): void {
  console.log(chalk.yellow('⚠') + ' ' + message);
}

export function error(message: string): void {
  console.log(chalk.red('✗') + ' ' + message);
}

export function info(message: string): void {
  console.log(chalk.blue('ℹ') + ' ' + message);
}
