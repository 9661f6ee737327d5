// src/utils/logger.ts
import { getLoggerProvider } from './otel_provider';
import { SeverityNumber } from '@opentelemetry/api-logs';

enum LogLevel {
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
  DEBUG = 'DEBUG',
}

const LOG_LEVEL_TO_SEVERITY: Record<LogLevel, SeverityNumber> = {
  [LogLevel.DEBUG]: SeverityNumber.DEBUG,
  [LogLevel.INFO]: SeverityNumber.INFO,
  [LogLevel.WARN]: SeverityNumber.WARN,
  [LogLevel.ERROR]: SeverityNumber.ERROR,
};

export interface AnalysisContext {
  project: string;
  model?: string;
}

export type LogMetadata = Record<string, string | number | boolean | undefined>;

export interface Logger {
  info: (message: string, metadata?: LogMetadata) => void;
  warn: (message: string, metadata?: LogMetadata) => void;
  error: (message: string, metadata?: LogMetadata) => void;
  debug: (message: string, metadata?: LogMetadata) => void;
}

function log(level: LogLevel, message: string, metadata: LogMetadata = {}, context?: AnalysisContext) {
  // Silent mode: skip console output in test environment
  if (process.env.NODE_ENV !== 'test') {
    const timestamp = new Date().toISOString();
    console.log(`[${timestamp}] [${level}] ${message}`);
  }

  const loggerProvider = getLoggerProvider();
  if (loggerProvider) {
    const logger = loggerProvider.getLogger('default');

    const attributes: Record<string, string | number | boolean> = {};
    for (const [key, value] of Object.entries(metadata)) {
      if (value !== undefined) {
        attributes[key] = value;
      }
    }

    if (context) {
      attributes['lookml.project'] = context.project;
      if (context.model) {
        attributes['lookml.model'] = context.model;
      }
    }

    logger.emit({
      severityNumber: LOG_LEVEL_TO_SEVERITY[level],
      severityText: level,
      body: message,
      attributes,
    });
  }
}

export function createLogger(context?: AnalysisContext): Logger {
  return {
    info: (message, metadata) => log(LogLevel.INFO, message, metadata, context),
    warn: (message, metadata) => log(LogLevel.WARN, message, metadata, context),
    error: (message, metadata) => log(LogLevel.ERROR, message, metadata, context),
    debug: (message, metadata) => log(LogLevel.DEBUG, message, metadata, context),
  };
}

export const logger = createLogger();
