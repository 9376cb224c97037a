import winston from 'winston';
import mongoose from 'mongoose';
import os from 'os';
import Transport from 'winston-transport';
import dotenv from 'dotenv';
import { LogMetadata } from './types';
import { getCurrentTraceContext } from './telemetry';

dotenv.config();

const isTestEnvironment = process.env.NODE_ENV === 'test';
const isMongoLoggingEnabled = process.env.MONGO_LOGGING_ENABLED === 'true';

const SERVICE_NAME = 'server-datasources-client';

interface LogEntry {
  timestamp: Date;
  level: string;
  message: string;
  service: string;
  component?: string;
  environment: string;
  host: string;
  pid: number;
  url?: string;
  method?: string;
  statusCode?: number;
  datasourceId?: string;
  stack?: string;
  traceId?: string;
  spanId?: string;
  metadata?: Record<string, unknown>;
}

// Schema for logs in MongoDB
const logSchema = new mongoose.Schema<LogEntry>(
  {
    timestamp: Date,
    level: String,
    message: String,
    service: String,
    component: String,
    environment: String,
    host: String,
    pid: Number,
    url: String,
    method: String,
    statusCode: Number,
    datasourceId: String,
    stack: String,
    traceId: String,
    spanId: String,
    metadata: mongoose.Schema.Types.Mixed,
  },
  { timestamps: true }
);

let LogModel: mongoose.Model<LogEntry> =
  mongoose.models.ClientLog ?? mongoose.model<LogEntry>('ClientLog', logSchema);

// Custom log levels with colors
const customLevels = {
  levels: {
    error: 0,
    warn: 1,
    info: 2,
    http: 3,
    debug: 4,
  },
  colors: {
    error: 'bold red',
    warn: 'bold yellow',
    info: 'bold green',
    http: 'bold cyan',
    debug: 'bold magenta',
  },
};

winston.addColors(customLevels.colors);

const formatTimestamp = (timestamp: unknown): string =>
  typeof timestamp === 'string' || typeof timestamp === 'number'
    ? new Date(timestamp).toISOString()
    : new Date().toISOString();

// Fields that are either printed in the prefix or are noise on a console
const PREFIX_FIELDS = ['service', 'environment', 'host', 'pid', 'component', 'traceId', 'spanId', 'stack'];

const cleanMetadata = (metadata: Record<string, unknown>): Record<string, unknown> => {
  const cleaned = { ...metadata };
  PREFIX_FIELDS.forEach(field => delete cleaned[field]);
  return cleaned;
};

/**
 * Renders `2024-01-01T00:00:00.000Z [info ] [endpoint.datasources] message`,
 * followed by metadata or a stack trace when present
 */
export const consoleFormat = winston.format.printf(({ level, message, timestamp, ...metadata }) => {
  const formattedDate = formatTimestamp(timestamp);
  const component = typeof metadata.component === 'string' ? metadata.component : '-';
  let prefix = `${formattedDate} [${level.padEnd(5)}] [${component}]`;

  if (typeof metadata.traceId === 'string' && metadata.traceId) {
    prefix = `${prefix} [trace:${metadata.traceId.substring(0, 8)}]`;
  }

  if (typeof metadata.stack === 'string') {
    return `${prefix} ${String(message)}\n${metadata.stack}`;
  }

  if (typeof metadata.method === 'string' && typeof metadata.url === 'string') {
    const status = typeof metadata.status === 'number' ? ` ${metadata.status}` : '';
    return `${prefix} ${metadata.method.padEnd(7)} ${metadata.url}${status}`;
  }

  const cleanedMeta = cleanMetadata(metadata);
  const metaString = Object.keys(cleanedMeta).length > 0
    ? ` ${JSON.stringify(cleanedMeta)}`
    : '';

  return `${prefix} ${String(message)}${metaString}`;
});

const stringField = (info: Record<string, unknown>, key: string): string =>
  typeof info[key] === 'string' ? String(info[key]) : '';

// Custom MongoDB transport
class MongoTransport extends Transport {
  name: string;

  constructor(opts: Transport.TransportStreamOptions) {
    super(opts);
    this.name = 'mongodb';
  }

  async log(info: Record<string, unknown>, callback?: () => void): Promise<void> {
    try {
      await LogModel.create({
        timestamp: new Date(),
        level: stringField(info, 'level'),
        message: stringField(info, 'message'),
        service: stringField(info, 'service') || SERVICE_NAME,
        component: stringField(info, 'component'),
        environment: process.env.NODE_ENV || 'development',
        host: stringField(info, 'host') || os.hostname(),
        pid: typeof info.pid === 'number' ? info.pid : process.pid,
        url: stringField(info, 'url'),
        method: stringField(info, 'method'),
        statusCode: typeof info.status === 'number' ? info.status : undefined,
        datasourceId: stringField(info, 'datasourceId'),
        stack: stringField(info, 'stack'),
        traceId: stringField(info, 'traceId'),
        spanId: stringField(info, 'spanId'),
        metadata: cleanMetadata(info),
      });
    } catch (error) {
      // The transport cannot log through winston without recursing
      console.error('Error saving log to MongoDB:', error);
    }

    if (callback) {
      callback();
    }
  }
}

const logger = winston.createLogger({
  levels: customLevels.levels,
  level: process.env.LOG_LEVEL || 'info',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.json()
  ),
  defaultMeta: {
    service: SERVICE_NAME,
    environment: process.env.NODE_ENV || 'development',
    host: os.hostname(),
    pid: process.pid,
  },
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.colorize({ all: true }),
        consoleFormat
      ),
    }),
    ...(isTestEnvironment || !isMongoLoggingEnabled ? [] : [
      new MongoTransport({
        level: 'info',
      })
    ]),
  ],
  exitOnError: false,
});

/**
 * Opens the dedicated MongoDB connection used by the log transport.
 * Resolves to null when MongoDB logging is disabled or under tests.
 */
export const initLogDB = async (): Promise<mongoose.Connection | null> => {
  if (isTestEnvironment || !isMongoLoggingEnabled) {
    const skipReason = isTestEnvironment ? 'Test environment detected' : 'MongoDB logging disabled';
    logger.debug(`${skipReason} - skipping MongoDB logger initialization`);
    return null;
  }

  const uri = process.env.MONGO_LOG_URI;
  if (!uri) {
    logger.warn('MONGO_LOGGING_ENABLED is set but MONGO_LOG_URI is missing - skipping MongoDB logger initialization');
    return null;
  }

  const logConnection = await mongoose.createConnection(uri).asPromise();
  LogModel = logConnection.model<LogEntry>('ClientLog', logSchema);

  logger.info('Logger MongoDB connection initialized');
  return logConnection;
};

/**
 * Logs an error with its stack trace and the active trace context
 */
export const logError = (error: Error, info: Partial<LogMetadata> = {}): void => {
  const traceContext = getCurrentTraceContext();

  logger.error(`Error: ${error.message}`, {
    ...info,
    stack: error.stack,
    traceId: info.traceId || traceContext.traceId,
    spanId: info.spanId || traceContext.spanId,
  });
};

export default logger;
