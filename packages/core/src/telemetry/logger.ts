/**
 * Stats Job Logger
 *
 * Every entry is a single JSON line carrying its severity, the service
 * label and whatever fields the caller attached. Cron mails whatever the
 * job prints, so the job logs progress at INFO and keeps DEBUG for per-row
 * detail.
 *
 * Entries below WARNING go to stdout unless the logger is told to keep
 * stdout free (`destination: 'stderr'`), as the CLI does when it prints
 * its result as JSON.
 *
 * @module @trailstats/core/telemetry/logger
 */

// =============================================================================
// Severities
// =============================================================================

/** Least to most severe */
export const SEVERITIES = ['DEBUG', 'INFO', 'NOTICE', 'WARNING', 'ERROR', 'CRITICAL'] as const;

export type Severity = (typeof SEVERITIES)[number];

export function isSeverity(value: string): value is Severity {
  return SEVERITIES.some(s => s === value);
}

function rank(severity: Severity): number {
  return SEVERITIES.indexOf(severity);
}

/**
 * `split`: stdout below WARNING, console.warn for WARNING, stderr above.
 * `stderr`: everything on stderr.
 */
export type LogDestination = 'split' | 'stderr';

export interface LoggerConfig {
  /** `labels.service` of every entry */
  serviceName: string;
  minSeverity?: Severity;
  /** Indented JSON, for reading logs by hand */
  prettyPrint?: boolean;
  destination?: LogDestination;
  /** Merged into every entry; child loggers add to these */
  defaultFields?: Record<string, unknown>;
}

export interface LogEntry {
  severity: Severity;
  message: string;
  /** ISO 8601 */
  timestamp: string;
  labels: { service: string };
  eventName?: string;
  error?: { message: string; stack?: string; code?: string };
  [key: string]: unknown;
}

type Fields = Record<string, unknown>;

// =============================================================================
// Logger
// =============================================================================

export class Logger {
  private readonly config: Required<LoggerConfig>;

  constructor(config: LoggerConfig) {
    this.config = {
      serviceName: config.serviceName,
      minSeverity: config.minSeverity ?? 'DEBUG',
      prettyPrint: config.prettyPrint ?? process.env.NODE_ENV === 'development',
      destination: config.destination ?? 'split',
      defaultFields: config.defaultFields ?? {},
    };
  }

  debug(message: string, fields?: Fields): void {
    this.emit('DEBUG', message, fields);
  }

  info(message: string, fields?: Fields): void {
    this.emit('INFO', message, fields);
  }

  notice(message: string, fields?: Fields): void {
    this.emit('NOTICE', message, fields);
  }

  warn(message: string, fields?: Fields): void {
    this.emit('WARNING', message, fields);
  }

  error(message: string, error?: unknown, fields?: Fields): void {
    this.emit('ERROR', message, { ...fields, ...describeError(error) });
  }

  critical(message: string, error?: unknown, fields?: Fields): void {
    this.emit('CRITICAL', message, { ...fields, ...describeError(error) });
  }

  /**
   * Opening line of a batch run
   */
  jobStart(jobType: string, jobId: string, fields?: Fields): void {
    this.info('Job started', { eventName: 'job.start', jobType, jobId, ...fields });
  }

  /**
   * Closing line of a batch run; a failed run logs at ERROR
   */
  jobEnd(jobType: string, jobId: string, success: boolean, durationMs: number, fields?: Fields): void {
    this.emit(success ? 'INFO' : 'ERROR', success ? 'Job completed' : 'Job failed', {
      eventName: success ? 'job.success' : 'job.failure',
      jobType,
      jobId,
      durationMs,
      ...fields,
    });
  }

  /**
   * Logger that stamps `fields` on every entry, e.g. the product or series
   * being worked on
   */
  child(fields: Fields): Logger {
    return new Logger({
      ...this.config,
      defaultFields: { ...this.config.defaultFields, ...fields },
    });
  }

  private emit(severity: Severity, message: string, fields?: Fields): void {
    if (rank(severity) < rank(this.config.minSeverity)) return;

    const entry: LogEntry = {
      ...this.config.defaultFields,
      ...fields,
      severity,
      message,
      timestamp: new Date().toISOString(),
      labels: { service: this.config.serviceName },
    };
    const line = this.config.prettyPrint ? JSON.stringify(entry, null, 2) : JSON.stringify(entry);

    if (this.config.destination === 'stderr' || rank(severity) >= rank('ERROR')) {
      console.error(line);
    } else if (severity === 'WARNING') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
}

function describeError(error: unknown): Fields {
  if (error === undefined || error === null) return {};
  if (!(error instanceof Error)) return { error: { message: String(error) } };

  const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
  return { error: { message: error.message, stack: error.stack, code } };
}

// =============================================================================
// Process-wide logger
// =============================================================================

let processLogger: Logger | null = null;

/**
 * Shared logger, created on first use at the level named by STATS_LOG_LEVEL
 */
export function getLogger(): Logger {
  if (processLogger === null) {
    const level = process.env.STATS_LOG_LEVEL;
    processLogger = new Logger({
      serviceName: 'trailstats',
      minSeverity: level !== undefined && isSeverity(level) ? level : 'INFO',
    });
  }
  return processLogger;
}

export function setLogger(logger: Logger): void {
  processLogger = logger;
}

export function createLogger(serviceName: string, config?: Partial<LoggerConfig>): Logger {
  return new Logger({ ...config, serviceName });
}
