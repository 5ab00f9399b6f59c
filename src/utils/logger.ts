import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const satisfies readonly LogLevel[];

let currentLevel: LogLevel = 'info';

/** Credentials masked in every log line. File URLs and some API errors carry the bot token. */
const secrets = new Set<string>();

const MASK = '***';

const levels: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function registerSecret(secret: string | undefined): void {
  if (secret) secrets.add(secret);
}

export function clearSecrets(): void {
  secrets.clear();
}

export function redact(text: string): string {
  let out = text;
  for (const secret of secrets) out = out.split(secret).join(MASK);
  return out;
}

function redactArgs(args: unknown[]): unknown[] {
  return args.map(a => (typeof a === 'string' ? redact(a) : a));
}

function shouldLog(level: LogLevel): boolean {
  return levels[level] >= levels[currentLevel];
}

function stamp(): string {
  return chalk.dim(new Date().toISOString());
}

export function debug(msg: string, ...args: unknown[]): void {
  if (shouldLog('debug')) console.log(stamp(), chalk.gray(`[DEBUG] ${redact(msg)}`), ...redactArgs(args));
}

export function info(msg: string, ...args: unknown[]): void {
  if (shouldLog('info')) console.log(stamp(), chalk.blue(`[INFO] ${redact(msg)}`), ...redactArgs(args));
}

export function warn(msg: string, ...args: unknown[]): void {
  if (shouldLog('warn')) console.log(stamp(), chalk.yellow(`[WARN] ${redact(msg)}`), ...redactArgs(args));
}

export function error(msg: string, ...args: unknown[]): void {
  if (shouldLog('error')) console.error(stamp(), chalk.red(`[ERROR] ${redact(msg)}`), ...redactArgs(args));
}

/** Message of an unknown thrown value. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
