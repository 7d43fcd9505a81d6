/**
 * Telemetry Module
 *
 * Structured JSON logging for the stats job.
 */

export {
  Logger,
  SEVERITIES,
  isSeverity,
  getLogger,
  setLogger,
  createLogger,
  type Severity,
  type LoggerConfig,
  type LogDestination,
  type LogEntry,
} from './logger.js';
