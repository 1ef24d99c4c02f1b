import fs from 'fs';
import path from 'path';

export type Level = 'debug' | 'info' | 'warn' | 'error';

export const LEVELS: readonly Level[] = ['debug', 'info', 'warn', 'error'];

export type LogEntry = {
  t: string;
  level: Level;
  msg: string;
  meta?: Record<string, unknown>;
};

export type Logger = {
  file: string | null;
  level: Level;
  log: (level: Level, message: string, meta?: Record<string, unknown>) => void;
  debug: (message: string, meta?: Record<string, unknown>) => void;
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
};

export function isLevel(v: string): v is Level {
  return LEVELS.some(l => l === v);
}

function buildLogger(level: Level, file: string | null, write: (entry: LogEntry) => void): Logger {
  const threshold = LEVELS.indexOf(level);

  function log(lvl: Level, message: string, meta?: Record<string, unknown>) {
    if (LEVELS.indexOf(lvl) < threshold) return;
    write({ t: new Date().toISOString(), level: lvl, msg: message, meta });
  }

  return {
    file,
    level,
    log,
    debug: (m, meta) => log('debug', m, meta),
    info: (m, meta) => log('info', m, meta),
    warn: (m, meta) => log('warn', m, meta),
    error: (m, meta) => log('error', m, meta),
  };
}

/**
 * JSON-lines logger appending to <dir>/latest.log.
 * The file is truncated on creation so it only holds the current run.
 */
export function createLogger(opts: { dir: string; level?: Level }): Logger {
  fs.mkdirSync(opts.dir, { recursive: true });
  const file = path.join(opts.dir, 'latest.log');
  fs.writeFileSync(file, '');

  return buildLogger(opts.level || 'info', file, entry => {
    try {
      fs.appendFileSync(file, JSON.stringify(entry) + '\n');
    } catch (e) {
      process.stderr.write(`[logger] cannot write ${file}: ${e instanceof Error ? e.message : String(e)}\n`);
    }
  });
}

/** Keeps entries in memory instead of writing a file. */
export function createMemoryLogger(level: Level = 'debug'): Logger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return { ...buildLogger(level, null, entry => entries.push(entry)), entries };
}
