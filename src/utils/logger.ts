import pino from 'pino';
import { config } from './config.js';

// Credential patterns to redact from free-form strings
const SECRET_PATTERNS = [
  /Bearer\s+[A-Za-z0-9\-_.~+/]+=*/gi,
  /Basic\s+[A-Za-z0-9+/]+=*/gi,
  /(access_token|refresh_token|client_secret|code_verifier)=[^&\s]+/gi,
  /password['":\s]+['"]?[^\s'"]+/gi,
];

// Keys whose values are never logged
const SECRET_KEY_PATTERN = /token$|secret|password|authorization|cookie|verifier|^code$/i;

function redactSecrets(obj: unknown): unknown {
  if (typeof obj === 'string') {
    let result = obj;
    for (const pattern of SECRET_PATTERNS) {
      result = result.replace(pattern, '[REDACTED]');
    }
    return result;
  }

  if (Array.isArray(obj)) {
    return obj.map(redactSecrets);
  }

  if (obj instanceof Error) {
    return obj;
  }

  if (obj !== null && typeof obj === 'object') {
    const redacted: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (SECRET_KEY_PATTERN.test(key)) {
        redacted[key] = '[REDACTED]';
      } else {
        redacted[key] = redactSecrets(value);
      }
    }
    return redacted;
  }

  return obj;
}

const baseOptions: pino.LoggerOptions = {
  level: config.logLevel,
  formatters: {
    level: (label) => ({ level: label }),
    bindings: () => ({}),
  },
  hooks: {
    logMethod(inputArgs, method) {
      const redactedArgs = inputArgs.map(redactSecrets) as Parameters<typeof method>;
      return method.apply(this, redactedArgs);
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
};

const devOptions: pino.LoggerOptions = {
  ...baseOptions,
  transport: {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
    },
  },
};

export const logger = pino(
  config.nodeEnv === 'development' ? devOptions : baseOptions
);

// Create child logger with correlation ID
export function createRequestLogger(correlationId: string) {
  return logger.child({ correlationId });
}

export type Logger = typeof logger;

export { redactSecrets as _redactSecrets };
