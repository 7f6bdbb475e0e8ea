import fs from 'node:fs';
import path from 'node:path';

export type StepLogger = {
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
  debug: (msg: string) => void;
  logPath: string | null;
};

export type LoggerOptions = {
  logPath?: string | null;
  debug?: boolean;
  // Defaults to the console; tests pass a collector.
  echo?: ((level: string, line: string) => void) | null;
};

const PREFIX = '[battle-log]';

function writeLine(logPath: string, level: string, msg: string) {
  fs.mkdirSync(path.dirname(logPath), { recursive: true });
  const ts = new Date().toISOString();
  fs.appendFileSync(logPath, `[${ts}] [${level}] ${msg}\n`, 'utf8');
}

function consoleEcho(level: string, line: string) {
  if (level === 'ERROR') console.error(line);
  else if (level === 'WARN') console.warn(line);
  else console.log(line);
}

export function createStepLogger(opts: LoggerOptions = {}): StepLogger {
  const logPath = opts.logPath ?? null;
  const echo = opts.echo === undefined ? consoleEcho : opts.echo;

  const emit = (level: string, msg: string) => {
    if (logPath) writeLine(logPath, level, msg);
    if (echo) echo(level, level === 'INFO' ? `${PREFIX} ${msg}` : `${PREFIX}[${level}] ${msg}`);
  };

  return {
    logPath,
    info: (msg) => emit('INFO', msg),
    warn: (msg) => emit('WARN', msg),
    error: (msg) => emit('ERROR', msg),
    debug: (msg) => {
      if (opts.debug) emit('DEBUG', msg);
    },
  };
}
