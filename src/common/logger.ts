import chalk from 'chalk';

export type LogLevel = 'INFO' | 'SUCCESS' | 'WARN' | 'ERROR';

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  INFO: chalk.blue,
  SUCCESS: chalk.green,
  WARN: chalk.yellow,
  ERROR: chalk.red,
};

export function dtm(dt = new Date()): string {
  const y = dt.getFullYear();
  const m = String(dt.getMonth() + 1).padStart(2, '0');
  const d = String(dt.getDate()).padStart(2, '0');
  const hh = String(dt.getHours()).padStart(2, '0');
  const mm = String(dt.getMinutes()).padStart(2, '0');
  const ss = String(dt.getSeconds()).padStart(2, '0');
  const ms = String(dt.getMilliseconds()).padStart(3, '0');
  return `${y}.${m}.${d} ${hh}:${mm}:${ss}.${ms}`;
}

/**
 * Write a jsonl log entry to stdout: timestamp, level, event name, then the given fields.
 */
export function logJsonl(level: LogLevel, event: string, fields: Record<string, unknown> = {}): void {
  console.log(
    JSON.stringify({
      timestamp: dtm(),
      level,
      event,
      ...fields,
    }),
  );
}

export function log(level: LogLevel, message: string): void {
  console.log(`[${dtm()}] ${LEVEL_COLORS[level](level)} - ${message}`);
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}
