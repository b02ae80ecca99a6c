import * as readline from 'readline';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel, { rank: number; color: string; write: (line: string) => void }> = {
  debug: { rank: 0, color: '\x1b[90m', write: (line) => console.log(line) },
  info: { rank: 1, color: '\x1b[36m', write: (line) => console.log(line) },
  warn: { rank: 2, color: '\x1b[33m', write: (line) => console.warn(line) },
  error: { rank: 3, color: '\x1b[31m', write: (line) => console.error(line) },
};

const RESET = '\x1b[0m';
const SILENT = Number.POSITIVE_INFINITY;

/**
 * Minimum rank from LOG_LEVEL ('silent' mutes everything). Under Vitest the
 * default is silent.
 */
function minimumRank(): number {
  const setting = process.env.LOG_LEVEL?.toLowerCase();
  if (setting === 'silent') {
    return SILENT;
  }
  if (setting === 'debug' || setting === 'info' || setting === 'warn' || setting === 'error') {
    return LEVELS[setting].rank;
  }
  return process.env.VITEST ? SILENT : LEVELS.info.rank;
}

const threshold = minimumRank();

// While the REPL is open, a log line clears the prompt and redraws it after.
let activeRl: readline.Interface | null = null;
let activePrompt: string | null = null;

export function setReadlineInterface(rl: readline.Interface | null, prompt: string | null): void {
  activeRl = rl;
  activePrompt = prompt;
}

function serialize(data: unknown): string {
  if (typeof data === 'string') {
    return data;
  }
  return JSON.stringify(data, (_key, value: unknown) =>
    value instanceof Error ? { name: value.name, message: value.message } : value
  );
}

export class Logger {
  private context: string;

  constructor(context: string) {
    this.context = context;
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    const { rank, color, write } = LEVELS[level];
    if (rank < threshold) {
      return;
    }

    const time = new Date().toISOString().slice(11, 23);
    const head = `${color}${time} ${level.toUpperCase().padEnd(5)}${RESET} ${this.context}: ${message}`;
    const line = data === undefined ? head : `${head} ${color}${serialize(data)}${RESET}`;

    const redraw = activeRl !== null && activePrompt !== null;
    if (redraw) {
      readline.clearLine(process.stdout, 0);
      readline.cursorTo(process.stdout, 0);
    }
    write(line);
    if (redraw) {
      activeRl?.prompt(true);
    }
  }

  debug(message: string, data?: unknown): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: unknown): void {
    this.log('error', message, data);
  }
}

export function createLogger(context: string): Logger {
  return new Logger(context);
}
