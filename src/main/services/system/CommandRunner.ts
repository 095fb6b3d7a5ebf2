import path from 'node:path';
import { spawn, type ChildProcess, type SpawnOptions } from 'node:child_process';

export interface CommandRunOptions {
  detached?: boolean;
  timeoutMs?: number;
  cwd?: string;
}

export interface CommandResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export interface CommandRunner {
  run(argv: readonly string[], options?: CommandRunOptions): Promise<CommandResult>;
}

const DEFAULT_TIMEOUT_MS = 5000;
const DEFAULT_PATH_SEGMENTS = ['/usr/local/sbin', '/usr/local/bin', '/usr/sbin', '/usr/bin', '/sbin', '/bin'];

export type SpawnFn = (command: string, args: readonly string[], options: SpawnOptions) => ChildProcess;

interface NodeCommandRunnerOptions {
  spawnFn?: SpawnFn;
  env?: NodeJS.ProcessEnv;
}

export class NodeCommandRunner implements CommandRunner {
  private readonly spawnFn: SpawnFn;
  private readonly env: NodeJS.ProcessEnv;

  constructor(options?: NodeCommandRunnerOptions) {
    this.spawnFn = options?.spawnFn ?? spawn;
    this.env = buildCommandEnvironment(options?.env ?? process.env);
  }

  run(argv: readonly string[], options?: CommandRunOptions): Promise<CommandResult> {
    const [command, ...args] = argv;
    if (!command) {
      return Promise.resolve(failedResult('Comando vazio.'));
    }

    if (options?.detached) {
      return this.launchDetached(command, args, options);
    }

    return this.runCaptured(command, args, options);
  }

  private runCaptured(command: string, args: string[], options?: CommandRunOptions): Promise<CommandResult> {
    const timeoutMs = normalizeTimeout(options?.timeoutMs);

    return new Promise((resolve) => {
      let child: ChildProcess;
      try {
        child = this.spawnFn(command, args, {
          cwd: options?.cwd,
          stdio: ['ignore', 'pipe', 'pipe'],
          env: this.env
        });
      } catch (error) {
        resolve(failedResult(toReason(error)));
        return;
      }

      let stdout = '';
      let stderr = '';
      let timedOut = false;
      let settled = false;

      child.stdout?.on('data', (chunk) => {
        stdout += String(chunk);
      });

      child.stderr?.on('data', (chunk) => {
        stderr += String(chunk);
      });

      const timeout = setTimeout(() => {
        timedOut = true;
        child.kill('SIGTERM');
      }, timeoutMs);

      child.once('close', (exitCode) => {
        clearTimeout(timeout);
        if (settled) {
          return;
        }
        settled = true;
        resolve({ exitCode: timedOut ? null : exitCode, stdout, stderr, timedOut });
      });

      child.once('error', (error) => {
        clearTimeout(timeout);
        if (settled) {
          return;
        }
        settled = true;
        resolve({ exitCode: null, stdout, stderr: `${stderr}\n${error.message}`.trim(), timedOut });
      });
    });
  }

  private launchDetached(command: string, args: string[], options?: CommandRunOptions): Promise<CommandResult> {
    return new Promise((resolve) => {
      try {
        const child = this.spawnFn(command, args, {
          cwd: options?.cwd,
          detached: true,
          stdio: 'ignore',
          env: this.env
        });
        child.unref();

        let settled = false;
        child.once('error', (error) => {
          if (settled) {
            return;
          }
          settled = true;
          resolve(failedResult(toReason(error)));
        });
        child.once('spawn', () => {
          if (settled) {
            return;
          }
          settled = true;
          resolve({ exitCode: 0, stdout: '', stderr: '', timedOut: false });
        });
      } catch (error) {
        resolve(failedResult(toReason(error)));
      }
    });
  }
}

export function buildCommandEnvironment(baseEnv: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
  const entries = (baseEnv.PATH ?? '')
    .split(path.delimiter)
    .map((entry) => entry.trim())
    .filter(Boolean);

  for (const fallback of DEFAULT_PATH_SEGMENTS) {
    if (!entries.includes(fallback)) {
      entries.push(fallback);
    }
  }

  return { ...baseEnv, PATH: entries.join(path.delimiter) };
}

export function firstOutputLine(output: string): string | null {
  const line = output
    .split('\n')
    .map((item) => item.trim())
    .find(Boolean);

  return line ?? null;
}

function failedResult(reason: string): CommandResult {
  return { exitCode: null, stdout: '', stderr: reason, timedOut: false };
}

function normalizeTimeout(value: number | undefined): number {
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    return DEFAULT_TIMEOUT_MS;
  }

  return Math.trunc(value);
}

function toReason(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
