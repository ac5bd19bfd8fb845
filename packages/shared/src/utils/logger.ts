import winston from 'winston';
import LokiTransport from 'winston-loki';

const logLevel = process.env.LOG_LEVEL || 'info';
const serviceName = process.env.SERVICE_NAME || 'banterbot';

const transports: winston.transport[] = [
  // Console transport with high-density format
  new winston.transports.Console({
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.timestamp({ format: 'HH:mm:ss' }),
      winston.format.printf(({ timestamp, level, service, message, ...meta }) => {
        // Skip pid and nodeVersion
        const { pid: _pid, nodeVersion: _nodeVersion, ...cleanMeta } = meta;

        // Collapse message to single line
        const cleanMessage = String(message).replace(/\n/g, ' ').replace(/\s+/g, ' ').trim();

        const hasUsefulMeta =
          Object.keys(cleanMeta).length > 0 &&
          !Object.values(cleanMeta).every((v) => v === undefined || v === null);

        const metaStr = hasUsefulMeta ? ` ${JSON.stringify(cleanMeta)}` : '';

        // Short service names
        const shortService = String(service || 'unknown')
          .replace('@banterbot/', '')
          .substring(0, 8);

        return `${String(timestamp)} ${level} ${shortService}: ${cleanMessage}${metaStr}`;
      })
    ),
  }),
];

if (process.env.LOKI_URL && process.env.LOKI_URL !== 'disabled') {
  transports.push(
    new LokiTransport({
      host: process.env.LOKI_URL,
      labels: {
        service: serviceName,
        environment: process.env.NODE_ENV || 'development',
        host: process.env.HOSTNAME || 'localhost',
      },
      json: true,
      format: winston.format.json(),
      replaceTimestamp: true,
    })
  );
}

if (process.env.NODE_ENV === 'production') {
  transports.push(
    new winston.transports.File({
      filename: 'logs/error.log',
      level: 'error',
      format: winston.format.json(),
    }),
    new winston.transports.File({
      filename: 'logs/combined.log',
      format: winston.format.json(),
    })
  );
}

export const logger = winston.createLogger({
  level: logLevel,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  defaultMeta: {
    service: serviceName,
    pid: process.pid,
    nodeVersion: process.version,
  },
  transports,
});

export interface LogMetrics {
  duration?: number;
  userId?: string;
  channelId?: string;
  correlationId?: string;
  command?: string;
  intent?: string;
  model?: string;
  attempt?: number;
  success?: boolean;
  error?: string;
  errorCode?: string;
  responseLength?: number;
  messageLength?: number;
}

export interface StructuredLogger {
  info(message: string, meta?: LogMetrics): void;
  error(message: string, error?: unknown, meta?: LogMetrics): void;
  warn(message: string, meta?: LogMetrics): void;
  debug(message: string, meta?: LogMetrics): void;
}

export const performanceLogger = {
  startTimer: (label: string) => {
    const start = process.hrtime.bigint();
    return {
      end: (meta?: LogMetrics) => {
        const duration = Number(process.hrtime.bigint() - start) / 1000000; // ns -> ms
        logger.debug(`${label} completed`, {
          ...meta,
          duration: Math.round(duration),
        });
        return duration;
      },
    };
  },

  measureAsync: async <T>(label: string, fn: () => Promise<T>, meta?: LogMetrics): Promise<T> => {
    const timer = performanceLogger.startTimer(label);
    try {
      const result = await fn();
      timer.end({ ...meta, success: true });
      return result;
    } catch (error) {
      timer.end({
        ...meta,
        success: false,
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      throw error;
    }
  },
};

export const structuredLogger: StructuredLogger = {
  info: (message, meta) => {
    logger.info(message, meta);
  },

  error: (message, error, meta) => {
    logger.error(message, {
      ...meta,
      error: error instanceof Error ? error.message : error === undefined ? undefined : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
  },

  warn: (message, meta) => {
    logger.warn(message, meta);
  },

  debug: (message, meta) => {
    logger.debug(message, meta);
  },
};

export default logger;
