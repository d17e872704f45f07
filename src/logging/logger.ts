import pino from 'pino';
import pinoPretty from 'pino-pretty';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export interface RootLoggerOptions {
  level: LogLevel;
  /** Human-readable colored output instead of JSON lines */
  pretty?: boolean;
  /** Override the output stream (tests) */
  destination?: pino.DestinationStream;
}

let _logger: pino.Logger | null = null;

/**
 * Build the root logger: pretty in dev, structured JSON on stdout otherwise.
 * The first call wins; later calls return the cached instance.
 */
export function initLogger(options: RootLoggerOptions): pino.Logger {
  if (_logger) return _logger;

  const stream =
    options.destination ?? (options.pretty ? pinoPretty({ colorize: true }) : process.stdout);

  _logger = pino({ level: options.level }, stream);
  return _logger;
}

export function createLogger(name: string): pino.Logger {
  if (!_logger) {
    // Fallback: a plain JSON logger when called before initLogger()
    const fallback = pino({ level: process.env.LOG_LEVEL || 'info' });
    return fallback.child({ module: name });
  }
  return _logger.child({ module: name });
}
