type LogFields = Record<string, string | number | boolean | null | undefined>;

function formatFields(fields?: LogFields): string {
  if (!fields) return '';
  return Object.entries(fields)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => ` ${key}=${String(value)}`)
    .join('');
}

export class Logger {
  private isDev: boolean;

  constructor(
    private readonly scope: string,
    env: Record<string, string | undefined> | undefined = runtimeEnv()
  ) {
    this.isDev = env?.NODE_ENV === 'development';
  }

  child(scope: string): Logger {
    const logger = new Logger(`${this.scope}:${scope}`);
    logger.isDev = this.isDev;
    return logger;
  }

  debug(message: string, fields?: LogFields): void {
    if (this.isDev) {
      console.debug('[DEBUG]', `[${this.scope}] ${message}${formatFields(fields)}`);
    }
  }

  info(message: string, fields?: LogFields): void {
    console.info('[INFO]', `[${this.scope}] ${message}${formatFields(fields)}`);
  }

  warn(message: string, fields?: LogFields): void {
    console.warn('[WARN]', `[${this.scope}] ${message}${formatFields(fields)}`);
  }

  error(message: string, fields?: LogFields): void {
    console.error('[ERROR]', `[${this.scope}] ${message}${formatFields(fields)}`);
  }
}

export function runtimeEnv(): Record<string, string | undefined> | undefined {
  return (globalThis as { process?: { env?: Record<string, string | undefined> } }).process?.env;
}

export const logger = new Logger('preview');
