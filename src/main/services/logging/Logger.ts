import fs from 'node:fs';
import path from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  ts: string;
  level: LogLevel;
  message: string;
  meta?: unknown;
}

export type AppLogger = Pick<Logger, 'debug' | 'info' | 'warn' | 'error'>;

interface LoggerOptions {
  mirrorFilePath?: string | null;
  minLevel?: LogLevel;
  console?: NodeJS.WritableStream | null;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export class Logger {
  private readonly filePath: string;
  private mirrorFilePath: string | null;
  private readonly minLevel: LogLevel;
  private readonly consoleStream: NodeJS.WritableStream | null;
  private readonly maxBytes = 2 * 1024 * 1024;

  constructor(baseDir: string, options?: LoggerOptions) {
    const logDir = path.join(baseDir, 'logs');
    fs.mkdirSync(logDir, { recursive: true });
    this.filePath = path.join(logDir, 'dockpanel.log');
    this.mirrorFilePath = normalizeMirrorPath(options?.mirrorFilePath);
    this.minLevel = options?.minLevel ?? 'debug';
    this.consoleStream = options?.console ?? null;
    if (this.mirrorFilePath) {
      fs.mkdirSync(path.dirname(this.mirrorFilePath), { recursive: true });
    }
  }

  debug(message: string, meta?: unknown): void {
    this.write('debug', message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.write('info', message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.write('warn', message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.write('error', message, meta);
  }

  isHealthy(): boolean {
    try {
      this.rotateIfNeeded();
      fs.appendFileSync(this.filePath, '');
      return true;
    } catch {
      return false;
    }
  }

  entries(limit?: number): LogEntry[] {
    const files = [`${this.filePath}.1`, this.filePath];
    const entries: LogEntry[] = [];

    for (const file of files) {
      if (!fs.existsSync(file)) {
        continue;
      }

      const text = fs.readFileSync(file, 'utf-8');
      for (const raw of text.split('\n')) {
        const line = raw.trim();
        if (!line) {
          continue;
        }

        entries.push(parseLogLine(line));
      }
    }

    if (typeof limit !== 'number' || !Number.isFinite(limit) || limit <= 0 || entries.length <= limit) {
      return entries;
    }

    return entries.slice(-Math.trunc(limit));
  }

  private write(level: LogLevel, message: string, meta?: unknown): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) {
      return;
    }

    const line = JSON.stringify({
      ts: new Date().toISOString(),
      level,
      message,
      meta
    });

    this.rotateIfNeeded();
    fs.appendFileSync(this.filePath, `${line}\n`);
    if (this.mirrorFilePath) {
      try {
        fs.appendFileSync(this.mirrorFilePath, `${line}\n`);
      } catch (error) {
        // espelho desativado apos a primeira falha de escrita
        const failedPath = this.mirrorFilePath;
        this.mirrorFilePath = null;
        this.write('warn', 'logger.mirror.disabled', {
          mirrorFilePath: failedPath,
          reason: error instanceof Error ? error.message : String(error)
        });
      }
    }
    this.consoleStream?.write(`${level.toUpperCase()} ${message}${meta === undefined ? '' : ` ${JSON.stringify(meta)}`}\n`);
  }

  private rotateIfNeeded(): void {
    if (!fs.existsSync(this.filePath)) {
      return;
    }

    const stats = fs.statSync(this.filePath);
    if (stats.size < this.maxBytes) {
      return;
    }

    const rotated = `${this.filePath}.1`;
    if (fs.existsSync(rotated)) {
      fs.rmSync(rotated, { force: true });
    }
    fs.renameSync(this.filePath, rotated);
  }
}

export function parseLogLevel(value: string | undefined): LogLevel | null {
  const normalized = value?.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : null;
}

function parseLogLine(line: string): LogEntry {
  try {
    const parsed: unknown = JSON.parse(line);
    const value = isRecord(parsed) ? parsed : {};
    return {
      ts: typeof value.ts === 'string' ? value.ts : new Date().toISOString(),
      level: isLogLevel(value.level) ? value.level : 'info',
      message: typeof value.message === 'string' ? value.message : line,
      meta: value.meta
    };
  } catch {
    return {
      ts: new Date().toISOString(),
      level: 'info',
      message: line
    };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isLogLevel(value: unknown): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

function normalizeMirrorPath(value: string | null | undefined): string | null {
  if (typeof value !== 'string') {
    return null;
  }
  const normalized = value.trim();
  return normalized ? normalized : null;
}
