// status: complete

const LOG_PREFIX = '[GENSESSION]';
const MAX_LOG_ENTRIES = 5000;

type Level = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

let logBuffer: string[] = [];

let counters: Record<string, number> = {};
const sample = (key: string, n: number) => ((counters[key] = (counters[key] || 0) + 1) % n) === 0;

function compact(value: unknown, max = 120): string {
  if (value instanceof Error) {
    return value.message.length > max ? value.message.slice(0, max) + '…' : value.message;
  }
  try {
    const s = typeof value === 'string' ? value : JSON.stringify(value) ?? String(value);
    return s.length > max ? s.slice(0, max) + '…' : s;
  } catch {
    return String(value);
  }
}

const fmtArgs = (...args: unknown[]) => args.map(a => compact(a, 160));

function addToBuffer(level: Level, message: string, ...args: unknown[]) {
  const timestamp = new Date().toISOString();
  const argsStr = args.length > 0 ? ' ' + args.map(arg => compact(arg, 500)).join(' ') : '';

  logBuffer.push(`${timestamp} | ${level.padEnd(5)} | ${LOG_PREFIX} | ${message}${argsStr}`);

  if (logBuffer.length > MAX_LOG_ENTRIES) {
    logBuffer = logBuffer.slice(-MAX_LOG_ENTRIES);
  }
}

const logger = {
  debug: (message: string, ...args: unknown[]) => {
    addToBuffer('DEBUG', message, ...args);
    console.debug(LOG_PREFIX, message, ...fmtArgs(...args));
  },
  // info stays in the buffer only; the stream is too chatty for the console
  info: (message: string, ...args: unknown[]) => {
    addToBuffer('INFO', message, ...args);
  },
  warn: (message: string, ...args: unknown[]) => {
    addToBuffer('WARN', message, ...args);
    console.warn(LOG_PREFIX, message, ...fmtArgs(...args));
  },
  error: (message: string, ...args: unknown[]) => {
    addToBuffer('ERROR', message, ...args);
    console.error(LOG_PREFIX, message, ...fmtArgs(...args));
  },

  downloadLogs: () => {
    const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
    const filename = `gensession-frontend-${timestamp}.log`;

    const blob = new Blob([logBuffer.join('\n')], { type: 'text/plain' });
    const url = URL.createObjectURL(blob);

    const a = document.createElement('a');
    a.href = url;
    a.download = filename;
    document.body.appendChild(a);
    a.click();
    document.body.removeChild(a);
    URL.revokeObjectURL(url);

    console.info(`${LOG_PREFIX} Downloaded ${logBuffer.length} log entries to ${filename}`);
  },

  getLogs: () => logBuffer.slice(),

  clearLogs: () => {
    logBuffer = [];
    counters = {};
  },
};

export { sample, compact, MAX_LOG_ENTRIES };

export default logger;
