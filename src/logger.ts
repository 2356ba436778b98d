type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const severity: Record<LogLevel | 'silent', number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const isKnownLevel = (value: string): value is keyof typeof severity =>
  Object.prototype.hasOwnProperty.call(severity, value);

const threshold = () => {
  const configured = (process.env.LOG_LEVEL ?? 'info').toLowerCase();
  return isKnownLevel(configured) ? severity[configured] : severity.info;
};

const format = (level: LogLevel, message: string, meta?: unknown) => {
  const time = new Date().toISOString();
  if (meta === undefined) {
    return `[${time}] [${level.toUpperCase()}] ${message}`;
  }
  return `[${time}] [${level.toUpperCase()}] ${message} ${JSON.stringify(meta)}`;
};

const enabled = (level: LogLevel) => severity[level] >= threshold();

export const logger = {
  debug(message: string, meta?: unknown) {
    if (enabled('debug')) {
      console.debug(format('debug', message, meta));
    }
  },
  info(message: string, meta?: unknown) {
    if (enabled('info')) {
      console.info(format('info', message, meta));
    }
  },
  warn(message: string, meta?: unknown) {
    if (enabled('warn')) {
      console.warn(format('warn', message, meta));
    }
  },
  error(message: string, meta?: unknown) {
    if (enabled('error')) {
      console.error(format('error', message, meta));
    }
  },
};

export const errorMessage = (error: unknown) => (error instanceof Error ? error.message : String(error));
