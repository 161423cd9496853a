import winston from 'winston';
import path from 'path';
import fs from 'fs';

// key=value or key: value pairs whose value must never reach a log line
const SENSITIVE_PATTERNS = [
  /\bpassword[=:]\s*["']?[^"'\s&]+["']?/gi,
  /\btoken[=:]\s*["']?[\w.-]+["']?/gi,
  /\bsid[=:]\s*["']?[\w+/=.-]+["']?/gi,
  /\bauth[=:]\s*["']?[\w.-]+["']?/gi,
];

/**
 * Mask credentials, tokens and session ids in a log message
 */
export function redactSensitive(message: string): string {
  let filtered = message;
  for (const pattern of SENSITIVE_PATTERNS) {
    filtered = filtered.replace(pattern, (match) => {
      const [key] = match.split(/[=:]/);
      return `${key}=***REDACTED***`;
    });
  }
  return filtered;
}

function resolveLevel(): string {
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }
  const debug = process.env.DEBUG;
  return debug && debug !== 'false' && debug !== '0' ? 'debug' : 'info';
}

const filterSensitiveData = winston.format((info) => {
  if (typeof info.message === 'string') {
    info.message = redactSensitive(info.message);
  }
  return info;
});

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  filterSensitiveData(),
  winston.format.printf(({ timestamp, level, message, module }) => {
    const modulePrefix = module ? `[${module}]` : '';
    return `${timestamp} ${level} ${modulePrefix} ${message}`;
  })
);

const fileFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  filterSensitiveData(),
  winston.format.json()
);

function createTransports(): winston.transport[] {
  const transports: winston.transport[] = [
    new winston.transports.Console({ format: consoleFormat }),
  ];

  // File output is opt-in; the exporter usually runs in a container that collects stdout
  const logFolder = process.env.LOG_FOLDER;
  if (logFolder) {
    fs.mkdirSync(logFolder, { recursive: true });
    transports.push(
      new winston.transports.File({
        filename: path.join(logFolder, 'error.log'),
        level: 'error',
        format: fileFormat,
        maxsize: 5242880, // 5MB
        maxFiles: 5,
      }),
      new winston.transports.File({
        filename: path.join(logFolder, 'combined.log'),
        format: fileFormat,
        maxsize: 5242880,
        maxFiles: 5,
      })
    );
  }

  return transports;
}

const logger = winston.createLogger({
  level: resolveLevel(),
  transports: createTransports(),
});

// Create a child logger with module context
export function createLogger(moduleName: string): winston.Logger {
  return logger.child({ module: moduleName });
}

export default logger;
