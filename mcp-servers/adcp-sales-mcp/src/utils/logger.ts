import path from 'path';
import winston from 'winston';
import { inspect } from 'util';

const isTest = process.env.NODE_ENV === 'test';
const logLevel = process.env.LOG_LEVEL || (isTest ? 'error' : 'info');

const SENSITIVE_KEY_REGEX = /(authorization|access[_-]?token|token|secret|api[_-]?key)/i;
const SENSITIVE_STRING_REGEXES = [
  /(access_token=)([^&\s]+)/gi,
  /([?&](?:token|secret|api_key)=)([^&\s]+)/gi,
  /(authorization["']?\s*[:=]\s*["']?bearer\s+)([a-z0-9\-_.]+)/gi,
  /("?(?:access[_-]?token|authorization|token|secret)"?\s*:\s*")([^"]+)(")/gi,
];

function redactString(input: string): string {
  return SENSITIVE_STRING_REGEXES.reduce((value, regex) => {
    return value.replace(regex, (_match, prefix: string, _secret: string, suffix?: string) => {
      if (suffix) return `${prefix}[REDACTED]${suffix}`;
      return `${prefix}[REDACTED]`;
    });
  }, input);
}

export function redactSensitivePayload(value: unknown): unknown {
  if (value == null) return value;

  if (typeof value === 'string') {
    return redactString(value);
  }

  if (Array.isArray(value)) {
    return value.map((entry) => redactSensitivePayload(entry));
  }

  if (typeof value === 'object') {
    const output: Record<string, unknown> = {};
    for (const [key, nestedValue] of Object.entries(value)) {
      output[key] = SENSITIVE_KEY_REGEX.test(key) ? '[REDACTED]' : redactSensitivePayload(nestedValue);
    }
    return output;
  }

  return value;
}

// Mutates in place: winston's info object carries symbol-keyed level/message fields.
const redactFormat = winston.format((info) => {
  for (const key of Object.keys(info)) {
    if (key === 'level' || key === 'timestamp') continue;
    info[key] = SENSITIVE_KEY_REGEX.test(key) ? '[REDACTED]' : redactSensitivePayload(info[key]);
  }
  return info;
});

export const logger = winston.createLogger({
  level: logLevel,
  format: winston.format.combine(
    redactFormat(),
    winston.format.timestamp({
      format: 'YYYY-MM-DD HH:mm:ss',
    }),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  defaultMeta: { service: 'adcp-sales-mcp' },
  transports: [],
});

const logDir = process.env.LOG_DIR;
if (logDir) {
  logger.add(new winston.transports.File({ filename: path.join(logDir, 'error.log'), level: 'error' }));
  logger.add(new winston.transports.File({ filename: path.join(logDir, 'combined.log') }));
}

// stdout belongs to the stdio MCP transport, so console output goes to stderr.
logger.add(
  new winston.transports.Console({
    stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
    silent: isTest && !process.env.LOG_LEVEL,
    format:
      process.env.NODE_ENV === 'production'
        ? winston.format.json()
        : winston.format.combine(
            winston.format.colorize(),
            winston.format.printf(({ level, message, timestamp, ...meta }) => {
              let output = `${String(timestamp)} [${level}]: ${String(message)}`;

              if (Object.keys(meta).length > 0) {
                try {
                  output += ` ${JSON.stringify(meta)}`;
                } catch {
                  // Circular references
                  output += ` ${inspect(meta, { depth: 2, colors: false })}`;
                }
              }

              return output;
            })
          ),
  })
);
