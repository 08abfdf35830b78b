/**
 * Diagnostic logging for folder-courier.
 *
 * Each line carries an ISO timestamp, the level and the metadata as JSON.
 * Message text and metadata are masked before they are written; the same
 * masking is applied to activity log records.
 *
 * COURIER_LOG_LEVEL: debug | info | warn | error | silent (default info,
 * or error when COURIER_QUIET=true). COURIER_REDACT_KEYS and
 * COURIER_REDACT_ENV_VARS add comma-separated names to mask.
 */

export type LogValue = string | number | boolean | null | undefined | LogValue[] | { [key: string]: LogValue };

export interface LogMetadata {
  [key: string]: LogValue;
}

type LevelName = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_RANK: Record<LevelName, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4
};

const MASK = '[REDACTED]';

const SECRET_PATTERNS: RegExp[] = [
  /Bearer\s+[A-Za-z0-9._-]{20,}/gi,
  /-----BEGIN [A-Z ]*PRIVATE KEY-----[\s\S]*?-----END [A-Z ]*PRIVATE KEY-----/g,
  /(?:secret|token|password|passwd|auth)[\s:=]+[A-Za-z0-9._-]{8,}/gi
];

// Mail credentials the CLI reads from the environment
const CREDENTIAL_ENV_NAMES = [
  'COURIER_SMTP_PASSWORD',
  'COURIER_SMTP_USER',
  'QQMAIL_PASSWORD',
  'GMAIL_APP_PASSWORD',
  'OUTLOOK_PASSWORD',
  'SMTP_PASSWORD'
];

const SECRET_WORDS = new Set([
  'token',
  'secret',
  'password',
  'passwd',
  'pwd',
  'authorization',
  'auth',
  'bearer',
  'session',
  'cookie',
  'apikey'
]);

const SECRET_WORD_PAIRS: Array<[string, string]> = [
  ['api', 'key'],
  ['client', 'secret'],
  ['access', 'token'],
  ['refresh', 'token']
];

function listFromEnv(name: string): string[] {
  return (process.env[name] ?? '')
    .split(',')
    .map(entry => entry.trim())
    .filter(entry => entry.length > 0);
}

/** `refreshToken`, `refresh-token` and `REFRESH_TOKEN` all become `refresh_token` */
function toSnakeCase(key: string): string {
  return key
    .replace(/([a-z])([A-Z])/g, '$1_$2')
    .replace(/[^a-zA-Z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '')
    .toLowerCase();
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Masking rules, built from the environment at the time of the call so that
 * COURIER_REDACT_* changes apply without a restart.
 */
class Redactor {
  private readonly envNames: string[];
  private readonly maskedKeys: Set<string>;

  constructor() {
    this.envNames = [...CREDENTIAL_ENV_NAMES, ...listFromEnv('COURIER_REDACT_ENV_VARS')];
    this.maskedKeys = new Set(
      [...this.envNames, ...listFromEnv('COURIER_REDACT_KEYS')].map(toSnakeCase)
    );
  }

  isSensitiveKey(key: string): boolean {
    const normalized = toSnakeCase(key);
    if (this.maskedKeys.has(normalized)) {
      return true;
    }
    const words = normalized.split('_').filter(Boolean);
    return words.some(word => SECRET_WORDS.has(word)) ||
      SECRET_WORD_PAIRS.some(([first, second]) => words.includes(first) && words.includes(second));
  }

  text(value: string): string {
    let masked = value;
    for (const name of this.envNames) {
      masked = masked.replace(new RegExp(`\\b${escapeRegExp(name)}\\s*=\\s*[^\\s;]+`, 'gi'), `${name}=${MASK}`);
    }
    for (const pattern of SECRET_PATTERNS) {
      masked = masked.replace(pattern, MASK);
    }
    return masked;
  }

  value(value: LogValue): LogValue {
    if (typeof value === 'string') {
      return this.text(value);
    }
    if (Array.isArray(value)) {
      return value.map(item => this.value(item));
    }
    if (value !== null && typeof value === 'object') {
      return this.metadata(value);
    }
    return value;
  }

  metadata(meta: LogMetadata): LogMetadata {
    const masked: LogMetadata = {};
    for (const [key, value] of Object.entries(meta)) {
      masked[key] = this.isSensitiveKey(key) ? MASK : this.value(value);
    }
    return masked;
  }
}

export function redactLogData(message: string, meta?: LogMetadata): { message: string; meta?: LogMetadata } {
  const redactor = new Redactor();
  return {
    message: redactor.text(message),
    meta: meta ? redactor.metadata(meta) : undefined
  };
}

function isLevelName(value: string): value is LevelName {
  return Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);
}

function resolveThreshold(): number {
  const configured = process.env.COURIER_LOG_LEVEL?.trim().toLowerCase();
  if (configured && isLevelName(configured)) {
    return LEVEL_RANK[configured];
  }
  return process.env.COURIER_QUIET === 'true' ? LEVEL_RANK.error : LEVEL_RANK.info;
}

const threshold = resolveThreshold();

function write(level: 'debug' | 'warn' | 'error', message: string, meta?: LogMetadata): void {
  if (LEVEL_RANK[level] < threshold) return;

  const { message: safeMessage, meta: safeMeta } = redactLogData(message, meta);
  const suffix = safeMeta && Object.keys(safeMeta).length > 0 ? ` ${JSON.stringify(safeMeta)}` : '';
  const line = `[${new Date().toISOString()}] [${level.toUpperCase()}] ${safeMessage}${suffix}\n`;

  if (level === 'debug') {
    process.stdout.write(line);
  } else {
    process.stderr.write(line);
  }
}

/**
 * Print to stdout without logging metadata
 * Use this for user-facing CLI output
 */
export function print(message: string): void {
  process.stdout.write(`${message}\n`);
}

export const log = {
  debug: (message: string, meta?: LogMetadata): void => write('debug', message, meta),
  warn: (message: string, meta?: LogMetadata): void => write('warn', message, meta),
  error: (message: string, error?: unknown, meta?: LogMetadata): void =>
    write('error', message, {
      ...meta,
      ...(error instanceof Error
        ? { errorName: error.name, errorMessage: error.message, errorStack: error.stack }
        : { error: String(error) })
    })
};
