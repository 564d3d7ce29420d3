/**
 * Monitoring & Observability Module
 * Structured console logging, optional log file, Sentry reporting and
 * per-run counters.
 */

import * as Sentry from '@sentry/node';
import { appendFileSync } from 'node:fs';
import type { PipelinePhase } from '../types/faculty';

// ============ Types ============

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  [key: string]: unknown;
}

export interface RunMetricsSnapshot {
  startedAt: number;
  durationMs: number;
  itemErrors: Partial<Record<PipelinePhase, number>>;
  phaseDurationsMs: Partial<Record<PipelinePhase, number>>;
  quotaExhaustedIn: PipelinePhase | null;
}

// ============ Logger ============

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

let minLevel: LogLevel = 'info';
let logFilePath: string | null = null;

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export function getLogLevel(): LogLevel {
  return minLevel;
}

/** Mirror every log line to a file in addition to the console. Pass null to stop. */
export function setLogFile(path: string | null): void {
  logFilePath = path;
}

function formatLog(level: LogLevel, message: string, context?: LogContext): string {
  const timestamp = new Date().toISOString();
  const contextStr = context && Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : '';
  return `[${timestamp}] [${level.toUpperCase()}] ${message}${contextStr}`;
}

function write(level: LogLevel, line: string): void {
  if (LEVEL_RANK[level] < LEVEL_RANK[minLevel]) return;

  switch (level) {
    case 'debug':
      console.debug(line);
      break;
    case 'info':
      console.info(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'error':
      console.error(line);
      break;
  }

  if (logFilePath) {
    appendFileSync(logFilePath, `${line}\n`, 'utf-8');
  }
}

export const logger = {
  debug(message: string, context?: LogContext) {
    write('debug', formatLog('debug', message, context));
  },

  info(message: string, context?: LogContext) {
    write('info', formatLog('info', message, context));
  },

  warn(message: string, context?: LogContext) {
    write('warn', formatLog('warn', message, context));
    Sentry.addBreadcrumb({
      category: 'warning',
      message,
      level: 'warning',
      data: context,
    });
  },

  error(message: string, error?: Error | unknown, context?: LogContext) {
    const detail = error instanceof Error ? { error: error.message } : error !== undefined ? { error: String(error) } : {};
    write('error', formatLog('error', message, { ...context, ...detail }));

    if (error instanceof Error) {
      Sentry.captureException(error, {
        extra: context,
        tags: { component: 'faculty-pipeline' },
      });
    } else {
      Sentry.captureMessage(message, {
        level: 'error',
        extra: { error, ...context },
      });
    }
  },
};

// ============ Sentry ============

export interface MonitoringOptions {
  dsn: string | null;
  environment?: string;
  release?: string;
}

/**
 * Enable Sentry reporting. Without a DSN the SDK stays uninitialized and the
 * logger's breadcrumb/capture calls are no-ops.
 */
export function initMonitoring(options: MonitoringOptions): boolean {
  if (!options.dsn) return false;

  Sentry.init({
    dsn: options.dsn,
    environment: options.environment ?? process.env.NODE_ENV ?? 'production',
    release: options.release,
    tracesSampleRate: 0,
  });
  return true;
}

export async function flushMonitoring(timeoutMs: number = 2000): Promise<void> {
  await Sentry.flush(timeoutMs);
}

// ============ Run Metrics ============

export class RunMetrics {
  readonly startedAt: number;
  private readonly itemErrors = new Map<PipelinePhase, number>();
  private readonly phaseStarts = new Map<PipelinePhase, number>();
  private readonly phaseDurations = new Map<PipelinePhase, number>();
  private quotaPhase: PipelinePhase | null = null;

  constructor(now: number = Date.now()) {
    this.startedAt = now;
  }

  /** Per-item failures are logged at debug level and only counted. */
  recordItemError(phase: PipelinePhase, message: string, context?: LogContext): void {
    this.itemErrors.set(phase, (this.itemErrors.get(phase) ?? 0) + 1);
    logger.debug(`[${phase}] ${message}`, context);
  }

  itemErrorCount(phase: PipelinePhase): number {
    return this.itemErrors.get(phase) ?? 0;
  }

  phaseStarted(phase: PipelinePhase): void {
    this.phaseStarts.set(phase, Date.now());
  }

  phaseFinished(phase: PipelinePhase): void {
    const started = this.phaseStarts.get(phase);
    if (started !== undefined) {
      this.phaseDurations.set(phase, Date.now() - started);
    }
  }

  markQuotaExhausted(phase: PipelinePhase): void {
    if (this.quotaPhase === null) {
      this.quotaPhase = phase;
      logger.warn('Search quota exhausted, remaining search-bound work is skipped', { phase });
    }
  }

  get quotaExhaustedIn(): PipelinePhase | null {
    return this.quotaPhase;
  }

  snapshot(now: number = Date.now()): RunMetricsSnapshot {
    return {
      startedAt: this.startedAt,
      durationMs: now - this.startedAt,
      itemErrors: Object.fromEntries(this.itemErrors),
      phaseDurationsMs: Object.fromEntries(this.phaseDurations),
      quotaExhaustedIn: this.quotaPhase,
    };
  }
}
