/**
 * Process logger
 * Prefixed, colored console logging with structured context
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

type LogThreshold = LogLevel | 'silent';

export interface LogContext {
  [key: string]: unknown;
}

const LEVEL_WEIGHT: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

// ANSI color codes
const colors = {
  reset: '\x1b[0m',
  gray: '\x1b[90m',
  cyan: '\x1b[36m',
  blue: '\x1b[34m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  magenta: '\x1b[35m',
  green: '\x1b[32m',
} as const;

function isThreshold(value: string): value is LogThreshold {
  return value in LEVEL_WEIGHT;
}

/**
 * Threshold is read on every call so tests and hosts can change LOG_LEVEL
 * after modules have created their loggers.
 */
function currentThreshold(): LogThreshold {
  const raw = (process.env.LOG_LEVEL ?? 'info').toLowerCase();
  return isThreshold(raw) ? raw : 'info';
}

export class Logger {
  private prefix: string;

  constructor(prefix: string = '') {
    this.prefix = prefix;
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_WEIGHT[level] >= LEVEL_WEIGHT[currentThreshold()];
  }

  private formatMessage(
    level: LogLevel,
    message: string,
    context?: LogContext
  ): string {
    const timestamp = new Date().toISOString();
    const prefixStr = this.prefix ? `[${this.prefix}] ` : '';
    const contextStr = context ? `\n${JSON.stringify(context, null, 2)}` : '';

    let levelColor: string;
    let levelLabel: string;

    switch (level) {
      case 'debug':
        levelColor = colors.gray;
        levelLabel = 'DEBUG';
        break;
      case 'info':
        levelColor = colors.cyan;
        levelLabel = 'INFO';
        break;
      case 'warn':
        levelColor = colors.yellow;
        levelLabel = 'WARN';
        break;
      case 'error':
        levelColor = colors.red;
        levelLabel = 'ERROR';
        break;
    }

    return `${colors.gray}[${timestamp}]${colors.reset} ${levelColor}[${levelLabel}]${colors.reset} ${colors.magenta}${prefixStr}${colors.reset}${message}${colors.green}${contextStr}${colors.reset}`;
  }

  debug(message: string, context?: LogContext): void {
    if (!this.enabled('debug')) return;
    // eslint-disable-next-line no-console
    console.debug(this.formatMessage('debug', message, context));
  }

  info(message: string, context?: LogContext): void {
    if (!this.enabled('info')) return;
    // eslint-disable-next-line no-console
    console.info(this.formatMessage('info', message, context));
  }

  warn(message: string, context?: LogContext): void {
    if (!this.enabled('warn')) return;
    console.warn(this.formatMessage('warn', message, context));
  }

  private formatError(error: unknown): string {
    if (!(error instanceof Error)) {
      return `\n${colors.red}Error details:${colors.reset}\n${JSON.stringify(error, null, 2)}`;
    }

    let output = `\n${colors.red}${error.name}: ${error.message}${colors.reset}`;

    // Stack without the first line, which repeats the message
    if (error.stack) {
      const stackLines = error.stack.split('\n').slice(1);
      output += `\n${colors.gray}${stackLines.join('\n')}${colors.reset}`;
    }

    if (error.cause) {
      output += `\n\n${colors.yellow}Caused by:${colors.reset}`;
      output += this.formatError(error.cause);
    }

    return output;
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    if (!this.enabled('error')) return;

    const timestamp = new Date().toISOString();
    const prefixStr = this.prefix ? `[${this.prefix}] ` : '';

    let output = `${colors.gray}[${timestamp}]${colors.reset} ${colors.red}[ERROR]${colors.reset} ${colors.magenta}${prefixStr}${colors.reset}${message}`;

    // Merge context with ExtendedError details if present
    let mergedContext: LogContext = { ...context };
    if (
      error &&
      typeof error === 'object' &&
      'details' in error &&
      typeof error.details === 'object' &&
      error.details !== null
    ) {
      mergedContext = {
        ...mergedContext,
        ...error.details,
      };
    }

    if (Object.keys(mergedContext).length > 0) {
      output += `\n${colors.green}Context:${colors.reset}\n${JSON.stringify(mergedContext, null, 2)}`;
    }

    if (error) {
      output += this.formatError(error);
    }

    console.error(output);
  }
}

export function createLogger(prefix: string): Logger {
  return new Logger(prefix);
}
