import { appendFile, mkdir } from 'node:fs/promises';
import path from 'node:path';
import process from 'node:process';

export type RuntimeLogLevel = 'debug' | 'info' | 'warn' | 'error';

export type RuntimeLogRecord = {
  ts: string;
  level: RuntimeLogLevel;
  component: string;
  message: string;
  data?: Record<string, unknown>;
};

type RuntimeLoggerOptions = {
  /** When omitted, records are only echoed to the console. */
  logDir?: string;
  component: string;
  level?: RuntimeLogLevel;
  echoToConsole?: boolean;
  now?: () => Date;
};

const LOG_LEVEL_WEIGHT: Record<RuntimeLogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const normalizeLevel = (value: string | undefined): RuntimeLogLevel => {
  if (!value) return 'info';
  const lowered = value.toLowerCase();
  if (lowered === 'debug' || lowered === 'info' || lowered === 'warn' || lowered === 'error') {
    return lowered;
  }
  return 'info';
};

export function serializeError(err: unknown): { name: string; message: string; stack?: string } | string {
  if (err instanceof Error) {
    return {
      name: err.name,
      message: err.message,
      stack: err.stack,
    };
  }

  return String(err);
}

export type RuntimeLogger = {
  debug: (message: string, data?: Record<string, unknown>) => void;
  info: (message: string, data?: Record<string, unknown>) => void;
  warn: (message: string, data?: Record<string, unknown>) => void;
  error: (message: string, data?: Record<string, unknown>) => void;
  child: (name: string) => RuntimeLogger;
  /** Resolves once every record written so far has reached the log file. */
  flush: () => Promise<void>;
};

export function createRuntimeLogger(options: RuntimeLoggerOptions): RuntimeLogger {
  return buildRuntimeLogger(options, new Set());
}

// Children share the parent's pending set so one flush() covers the whole tree.
function buildRuntimeLogger(
  options: RuntimeLoggerOptions,
  pending: Set<Promise<void>>,
): RuntimeLogger {
  const threshold = normalizeLevel(options.level ?? process.env.LOG_LEVEL);
  const echoToConsole = options.echoToConsole ?? process.env.NODE_ENV !== 'test';
  const logPath = options.logDir ? path.join(options.logDir, 'runtime.jsonl') : null;
  const now = options.now ?? (() => new Date());

  const write = async (level: RuntimeLogLevel, message: string, data?: Record<string, unknown>) => {
    const record: RuntimeLogRecord = {
      ts: now().toISOString(),
      level,
      component: options.component,
      message,
      ...(data ? { data } : {}),
    };

    if (echoToConsole) {
      const prefix = `[${record.ts}] [${record.level}] [${record.component}] ${record.message}`;
      if (level === 'error' || level === 'warn') {
        console.error(prefix, data ?? '');
      } else {
        console.log(prefix, data ?? '');
      }
    }

    if (!logPath) return;
    await mkdir(path.dirname(logPath), { recursive: true });
    await appendFile(logPath, JSON.stringify(record) + '\n', 'utf8');
  };

  const fireAndForget = (level: RuntimeLogLevel, message: string, data?: Record<string, unknown>) => {
    if (LOG_LEVEL_WEIGHT[level] < LOG_LEVEL_WEIGHT[threshold]) {
      return;
    }

    const task = write(level, message, data).catch((err) => {
      const fallback = serializeError(err);
      console.error(`[runtime-logger-failure] ${options.component}`, fallback);
    });
    pending.add(task);
    void task.finally(() => pending.delete(task));
  };

  return {
    debug: (message, data) => fireAndForget('debug', message, data),
    info: (message, data) => fireAndForget('info', message, data),
    warn: (message, data) => fireAndForget('warn', message, data),
    error: (message, data) => fireAndForget('error', message, data),
    child: (name) =>
      buildRuntimeLogger(
        {
          ...options,
          component: `${options.component}.${name}`,
        },
        pending,
      ),
    flush: async () => {
      await Promise.all([...pending]);
    },
  };
}
