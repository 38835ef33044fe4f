import winston, { format } from 'winston';
import { GatewayConfig } from '@/types/config';

const { combine, timestamp, printf, colorize, errors, json } = format;

/**
 * Minimal logging surface the gateway components depend on.
 * Compatible with {@link Logger} and with plain test doubles.
 */
export interface LoggerLike {
  info(message: string, meta?: object): void;
  warn(message: string, meta?: object): void;
  error(message: string, meta?: object): void;
  debug(message: string, meta?: object): void;
}

const devFormat = printf(({ level, message, timestamp: ts, ...meta }) => {
  const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `${String(ts)} ${level}: ${String(message)}${metaStr}`;
});

export class Logger implements LoggerLike {
  private static instance: Logger | undefined;
  private readonly logger: winston.Logger;

  private constructor(level: string, environment: string) {
    this.logger = winston.createLogger({
      level,
      format:
        environment === 'development'
          ? combine(timestamp(), errors({ stack: true }), colorize(), devFormat)
          : combine(timestamp(), errors({ stack: true }), json()),
      defaultMeta: { service: 'divi-rpc-gateway' },
      transports: [new winston.transports.Console()],
      exitOnError: false,
    });
  }

  static getInstance(config: GatewayConfig): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger(config.server.logLevel, config.server.environment);
    }
    return Logger.instance;
  }

  info(message: string, meta?: object): void {
    this.logger.info(message, meta);
  }

  warn(message: string, meta?: object): void {
    this.logger.warn(message, meta);
  }

  error(message: string, meta?: object): void {
    this.logger.error(message, meta);
  }

  debug(message: string, meta?: object): void {
    this.logger.debug(message, meta);
  }
}
